export const CRITICAL_FAILURE_PREFIX = "CRITICAL_FAILURE:";

export function describeError(err: unknown): string {
	if (err instanceof Error) return err.message || err.name;
	if (typeof err === "string") return err;
	if (
		err &&
		typeof err === "object" &&
		"message" in err &&
		typeof err.message === "string"
	) {
		return err.message;
	}
	try {
		return JSON.stringify(err) ?? String(err);
	} catch {
		return String(err);
	}
}

export function isAbortError(err: unknown): boolean {
	return err instanceof Error && err.name === "AbortError";
}

export function criticalFailure(err: unknown): string {
	return `${CRITICAL_FAILURE_PREFIX} ${describeError(err)}`;
}
