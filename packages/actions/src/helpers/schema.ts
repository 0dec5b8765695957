/**
 * Zod to JSON Schema conversion.
 *
 * Used to show the model the exact params each action kind accepts.
 */

import { type ZodType, z } from "zod";

// ============================================
// Zod → JSON Schema
// ============================================

/**
 * Convert a Zod schema to a stable JSON Schema representation.
 * Handles the Zod types used in action definitions.
 */
export function zodToJsonSchema(schema: ZodType): Record<string, unknown> {
	const converted = convertZodType(schema);
	if (schema.description && converted.description === undefined) {
		return { ...converted, description: schema.description };
	}
	return converted;
}

function convertZodType(schema: ZodType): Record<string, unknown> {
	if (schema instanceof z.ZodString) {
		return { type: "string" };
	}
	if (schema instanceof z.ZodNumber) {
		return { type: "number" };
	}
	if (schema instanceof z.ZodBoolean) {
		return { type: "boolean" };
	}
	if (schema instanceof z.ZodEnum) {
		return { type: "string", enum: schema._def.values };
	}
	if (schema instanceof z.ZodArray) {
		return { type: "array", items: zodToJsonSchema(schema._def.type) };
	}
	if (schema instanceof z.ZodOptional) {
		return zodToJsonSchema(schema._def.innerType);
	}
	if (schema instanceof z.ZodNullable) {
		const inner = zodToJsonSchema(schema._def.innerType);
		return { ...inner, nullable: true };
	}
	if (schema instanceof z.ZodDefault) {
		const inner = zodToJsonSchema(schema._def.innerType);
		return { ...inner, default: schema._def.defaultValue() };
	}
	// Refinements and transforms keep the input shape
	if (schema instanceof z.ZodEffects) {
		return zodToJsonSchema(schema._def.schema);
	}
	if (schema instanceof z.ZodPipeline) {
		return zodToJsonSchema(schema._def.out);
	}
	if (schema instanceof z.ZodObject) {
		const shape: z.ZodRawShape = schema._def.shape();
		const properties: Record<string, unknown> = {};
		const required: string[] = [];

		for (const [key, value] of Object.entries(shape)) {
			properties[key] = zodToJsonSchema(value);
			if (!(value instanceof z.ZodOptional) && !(value instanceof z.ZodDefault)) {
				required.push(key);
			}
		}

		const result: Record<string, unknown> = { type: "object", properties };
		if (required.length > 0) {
			result.required = required;
		}
		if (schema._def.unknownKeys === "strict") {
			result.additionalProperties = false;
		}
		return result;
	}
	if (schema instanceof z.ZodRecord) {
		const result: Record<string, unknown> = {
			type: "object",
			additionalProperties: zodToJsonSchema(schema._def.valueType),
		};
		if (schema._def.keyType instanceof z.ZodEnum) {
			result.propertyNames = { enum: schema._def.keyType._def.values };
		}
		return result;
	}
	if (schema instanceof z.ZodUnion) {
		const options: readonly ZodType[] = schema._def.options;
		return { oneOf: options.map(zodToJsonSchema) };
	}
	if (schema instanceof z.ZodLiteral) {
		return { type: typeof schema._def.value, const: schema._def.value };
	}
	if (schema instanceof z.ZodAny || schema instanceof z.ZodUnknown) {
		return {};
	}

	// Fallback for unhandled types
	return {};
}
