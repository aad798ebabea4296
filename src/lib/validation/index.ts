/**
 * Validation wrapper: thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Re-exports `z` so schemas are built against the same zod instance the
 * wrapper parses with.
 */

import { z } from "zod";
import { ErrorKind, WatcherError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Configuration-class error listing every validation issue found. */
export class ValidationError extends WatcherError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorKind.Config, { issueCount: issues.length });
		this.name = "ValidationError";
		this.issues = issues;
	}

	/** One line per issue, `path: message`, for log output. */
	describe(): string {
		return this.issues
			.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
			.join("; ");
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(new ValidationError("Validation failed", issues));
}
