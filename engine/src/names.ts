import fs from 'node:fs';
import yaml from 'js-yaml';
import Ajv2020 from 'ajv/dist/2020';
import { TypeNameRegistry } from './registry';
import { debug } from './log';

// STI -> binding name, written as a JSON or YAML mapping
const schema = {
	type: 'object',
	propertyNames: { minLength: 3, pattern: '^c:' },
	additionalProperties: { type: 'string', minLength: 1 },
};

const ajv = new Ajv2020({ allErrors: true, strict: false });
const validate = ajv.compile<Record<string, string>>(schema);

export function parseTypeNames(raw: string, source = '<input>'): TypeNameRegistry {
	const obj = yaml.load(raw, { json: true });
	if (obj === undefined || obj === null) {
		throw new Error(`Type name file "${source}" appears to be empty or could not be parsed`);
	}
	if (!validate(obj)) {
		const msg = (validate.errors || []).map(e => `${e.instancePath || '/'} ${e.message}`).join('\n');
		throw new Error(`Type name file "${source}" failed validation:\n${msg}`);
	}
	const registry = TypeNameRegistry.fromObject(obj);
	debug('names', `${registry.size} names from ${source}`);
	return registry;
}

export function loadTypeNames(file: string): TypeNameRegistry {
	return parseTypeNames(fs.readFileSync(file, 'utf8'), file);
}
