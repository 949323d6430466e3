import {Either} from 'effect';
import {
	InvalidJsonError,
	NotAnObjectError,
	type JsonValidationError,
} from '../types/errors.js';
import type {JsonObject} from '../types/index.js';

type NonObjectType = NotAnObjectError['receivedType'];

function isJsonObject(value: unknown): value is JsonObject {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeNonObject(value: unknown): NonObjectType {
	if (Array.isArray(value)) return 'array';
	switch (typeof value) {
		case 'string':
			return 'string';
		case 'number':
			return 'number';
		case 'boolean':
			return 'boolean';
		default:
			return 'null';
	}
}

/**
 * Check that content is syntactically valid JSON.
 * Pure; the parsed value is returned on success.
 */
export function parseJson(
	content: string,
	path?: string,
): Either.Either<unknown, InvalidJsonError> {
	try {
		const value: unknown = JSON.parse(content);
		return Either.right(value);
	} catch (error) {
		return Either.left(
			new InvalidJsonError({
				details: error instanceof Error ? error.message : String(error),
				...(path !== undefined ? {path} : {}),
			}),
		);
	}
}

/**
 * Validate settings content: valid JSON whose top-level value is an object.
 * Object contents are not inspected.
 */
export function validateJson(
	content: string,
	path?: string,
): Either.Either<JsonObject, JsonValidationError> {
	return Either.flatMap(
		parseJson(content, path),
		(value): Either.Either<JsonObject, JsonValidationError> => {
			if (!isJsonObject(value)) {
				return Either.left(
					new NotAnObjectError({
						receivedType: describeNonObject(value),
						...(path !== undefined ? {path} : {}),
					}),
				);
			}
			return Either.right(value);
		},
	);
}
