/**
 * Error types surfaced by tokenwatch.
 *
 * CLI commands treat every one of these as fatal for the invocation. The daemon only lets
 * ConfigurationError stop it; storage errors abort a single sweep and delivery errors a
 * single notification.
 */

export class ValidationError extends Error {
	constructor(
		message: string,
		public readonly field?: string,
	) {
		super(message);
		this.name = "ValidationError";
	}
}

export class ConfigurationError extends Error {
	constructor(
		message: string,
		public readonly key?: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "ConfigurationError";
	}
}

export class StorageError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "StorageError";
	}
}

export class NotificationDeliveryError extends Error {
	constructor(
		message: string,
		public readonly status?: number,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "NotificationDeliveryError";
	}
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
