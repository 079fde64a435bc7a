import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { loadTypeNames, parseTypeNames } from '../src/names';
import { fixturesDir } from './testUtils';

describe('type name files', () => {
	it('reads a JSON mapping', () => {
		expect(loadTypeNames(path.join(fixturesDir, 'names.json')).entries()).toEqual([['c:@T@Vector2', 'Vec2']]);
	});

	it('reads a YAML mapping', () => {
		expect(loadTypeNames(path.join(fixturesDir, 'names.yaml')).entries()).toEqual([
			['c:@S@Color', 'Rgba'],
			['c:@T@Sprite', 'SpriteData'],
		]);
	});

	it('rejects names that are not strings', () => {
		expect(() => parseTypeNames('{"c:@T@Point": 3}', 'bad.json')).toThrow('Type name file "bad.json" failed validation');
	});

	it('rejects keys that are not type identities', () => {
		expect(() => parseTypeNames('Point: Vec2\n')).toThrow('failed validation');
	});

	it('rejects an empty file', () => {
		expect(() => parseTypeNames('', 'empty.yaml')).toThrow('Type name file "empty.yaml" appears to be empty or could not be parsed');
	});

	it('rejects a list', () => {
		expect(() => parseTypeNames('- a\n- b\n')).toThrow('failed validation');
	});
});
