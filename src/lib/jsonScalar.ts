import { GraphQLError, GraphQLScalarType, Kind, type ValueNode } from 'graphql';

type JsonPrimitive = string | number | boolean | null;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPrimitive(value: unknown): JsonPrimitive {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  throw new GraphQLError(`JSONObject values must be strings, finite numbers, booleans or null`);
}

function toJsonObject(value: unknown): Record<string, JsonPrimitive> {
  if (!isPlainObject(value)) throw new GraphQLError('JSONObject must be an object');
  const out: Record<string, JsonPrimitive> = {};
  for (const [key, v] of Object.entries(value)) out[key] = toPrimitive(v);
  return out;
}

function literalValue(ast: ValueNode): JsonPrimitive {
  switch (ast.kind) {
    case Kind.STRING:
      return ast.value;
    case Kind.BOOLEAN:
      return ast.value;
    case Kind.INT:
    case Kind.FLOAT:
      return Number(ast.value);
    case Kind.NULL:
      return null;
    default:
      throw new GraphQLError(`Unsupported JSONObject literal: ${ast.kind}`);
  }
}

/** Flat string-keyed map of primitive values, used for challenge context. */
export const JSONObject = new GraphQLScalarType<Record<string, JsonPrimitive>, Record<string, JsonPrimitive>>({
  name: 'JSONObject',
  description: 'Flat JSON object of string, number, boolean or null values',
  serialize: toJsonObject,
  parseValue: toJsonObject,
  parseLiteral(ast) {
    if (ast.kind !== Kind.OBJECT) throw new GraphQLError('JSONObject literal must be an object');
    const out: Record<string, JsonPrimitive> = {};
    for (const field of ast.fields) out[field.name.value] = literalValue(field.value);
    return out;
  },
});
