import { z, type ZodTypeAny } from 'zod';
import type { JSONSchema7, JSONSchema7Type } from 'json-schema';

function isJsonValue(value: unknown): value is JSONSchema7Type {
	if (value === null) return true;
	switch (typeof value) {
		case 'string':
		case 'number':
		case 'boolean':
			return true;
		case 'object':
			return Array.isArray(value)
				? value.every(isJsonValue)
				: Object.values(value).every(isJsonValue);
		default:
			return false;
	}
}

function describe(node: JSONSchema7, schema: ZodTypeAny): JSONSchema7 {
	return schema.description ? { ...node, description: schema.description } : node;
}

/**
 * Converts a tool's zod object schema into the JSON Schema advertised to models.
 * Covers the field types tool parameters use; anything else is exported as an
 * unconstrained object.
 */
export function zodToJsonSchema(schema: z.AnyZodObject): JSONSchema7 {
	const properties: Record<string, JSONSchema7> = {};
	const required: string[] = [];

	for (const [key, value] of Object.entries<ZodTypeAny>(schema.shape)) {
		properties[key] = fieldToJsonSchema(value);
		if (!value.isOptional()) {
			required.push(key);
		}
	}

	const node: JSONSchema7 = { type: 'object', properties, additionalProperties: false };
	if (required.length > 0) {
		node.required = required;
	}
	return describe(node, schema);
}

export function fieldToJsonSchema(schema: ZodTypeAny): JSONSchema7 {
	if (schema instanceof z.ZodString) {
		const node: JSONSchema7 = { type: 'string' };
		if (schema.minLength !== null) node.minLength = schema.minLength;
		if (schema.maxLength !== null) node.maxLength = schema.maxLength;
		return describe(node, schema);
	}
	if (schema instanceof z.ZodNumber) {
		const node: JSONSchema7 = { type: schema.isInt ? 'integer' : 'number' };
		if (schema.minValue !== null) node.minimum = schema.minValue;
		if (schema.maxValue !== null) node.maximum = schema.maxValue;
		return describe(node, schema);
	}
	if (schema instanceof z.ZodBoolean) {
		return describe({ type: 'boolean' }, schema);
	}
	if (schema instanceof z.ZodEnum) {
		const options: string[] = [...schema.options];
		return describe({ type: 'string', enum: options }, schema);
	}
	if (schema instanceof z.ZodArray) {
		const node: JSONSchema7 = { type: 'array', items: fieldToJsonSchema(schema.element) };
		if (schema._def.minLength) node.minItems = schema._def.minLength.value;
		if (schema._def.maxLength) node.maxItems = schema._def.maxLength.value;
		return describe(node, schema);
	}
	if (schema instanceof z.ZodObject) {
		return zodToJsonSchema(schema);
	}
	if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
		const inner = fieldToJsonSchema(schema.unwrap());
		return schema.description ? { ...inner, description: schema.description } : inner;
	}
	if (schema instanceof z.ZodDefault) {
		const inner = fieldToJsonSchema(schema.removeDefault());
		const fallback: unknown = schema._def.defaultValue();
		return isJsonValue(fallback) ? { ...inner, default: fallback } : inner;
	}
	if (schema instanceof z.ZodLiteral) {
		const value: unknown = schema.value;
		return isJsonValue(value) ? describe({ const: value }, schema) : describe({}, schema);
	}
	if (schema instanceof z.ZodUnion) {
		const options: ZodTypeAny[] = schema.options;
		return describe({ anyOf: options.map(fieldToJsonSchema) }, schema);
	}
	return describe({ type: 'object' }, schema);
}
