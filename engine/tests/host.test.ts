import { describe, it, expect, beforeEach } from 'vitest';
import { clearIncludeResolverCache } from '../src/core/pipeline';
import {
	HostContractError, configureHost, customTypeNames, evaluateMacro, liveStringCount, readString, releaseString, setCustomTypeNames,
} from '../src/host';
import { SHAPES_PATH, shapesOptions, unreadable } from './testUtils';

describe('host interface', () => {
	beforeEach(() => {
		clearIncludeResolverCache();
		configureHost(shapesOptions());
		setCustomTypeNames([], [], 0);
	});

	it('hands out a string handle until it is released', () => {
		const before = liveStringCount();
		const handle = evaluateMacro(SHAPES_PATH, 'P');
		expect(handle).not.toBe(0);
		expect(readString(handle)).toBe('Point P = Point{x=1, y=2};');
		expect(liveStringCount()).toBe(before + 1);
		releaseString(handle);
		expect(liveStringCount()).toBe(before);
		expect(() => readString(handle)).toThrow(HostContractError);
	});

	it('gives every evaluation its own handle', () => {
		const a = evaluateMacro(SHAPES_PATH, 'P');
		const b = evaluateMacro(SHAPES_PATH, 'P');
		expect(a).not.toBe(b);
		releaseString(a);
		expect(readString(b)).toBe('Point P = Point{x=1, y=2};');
		releaseString(b);
	});

	it('returns 0 when nothing is produced and accepts releasing it', () => {
		const before = liveStringCount();
		expect(evaluateMacro(SHAPES_PATH, 'ANSWER')).toBe(0);
		releaseString(0);
		expect(liveStringCount()).toBe(before);
	});

	it('returns 0 for a header that cannot be read', () => {
		const options = shapesOptions();
		configureHost({ ...options, fs: unreadable(options.fs, SHAPES_PATH) });
		expect(evaluateMacro(SHAPES_PATH, 'P')).toBe(0);
	});

	it('ignores a second release of the same handle', () => {
		const handle = evaluateMacro(SHAPES_PATH, 'P');
		releaseString(handle);
		expect(() => releaseString(handle)).not.toThrow();
	});

	it('uses the custom type names for later evaluations', () => {
		setCustomTypeNames(['c:@T@Point', 'c:@S@Unused'], ['Vec2', 'X'], 1);
		expect(customTypeNames()).toEqual([['c:@T@Point', 'Vec2']]);
		const renamed = evaluateMacro(SHAPES_PATH, 'P');
		expect(readString(renamed)).toBe('Vec2 P = Vec2{x=1, y=2};');
		setCustomTypeNames([], [], 0);
		const plain = evaluateMacro(SHAPES_PATH, 'P');
		expect(readString(plain)).toBe('Point P = Point{x=1, y=2};');
		releaseString(renamed);
		releaseString(plain);
	});

	it('rejects a count larger than the arrays and keeps the previous names', () => {
		setCustomTypeNames(['c:@T@Point'], ['Vec2'], 1);
		expect(() => setCustomTypeNames(['a'], ['b', 'c'], 2)).toThrow(HostContractError);
		expect(() => setCustomTypeNames([], [], -1)).toThrow(HostContractError);
		expect(customTypeNames()).toEqual([['c:@T@Point', 'Vec2']]);
	});

	it('passes compiler arguments through', () => {
		expect(evaluateMacro(SHAPES_PATH, 'ALT')).toBe(0);
		const handle = evaluateMacro(SHAPES_PATH, 'ALT', ['-DUSE_ALT']);
		expect(readString(handle)).toBe('Point ALT = Point{x=8, y=9};');
		releaseString(handle);
	});
});
