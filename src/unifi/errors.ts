// src/unifi/errors.ts

export class UnifiError extends Error {
	public constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'UnifiError';
	}
}

/** 401/403 from the console: the API key is wrong or lacks permission. */
export class UnifiAuthError extends UnifiError {
	public constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'UnifiAuthError';
	}
}

/** Timeouts, socket failures, unexpected HTTP statuses and unreadable bodies. */
export class UnifiConnectionError extends UnifiError {
	public constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'UnifiConnectionError';
	}
}

export class UnifiNotFoundError extends UnifiError {
	public constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'UnifiNotFoundError';
	}
}

export function describeError(err: unknown): string {
	if (err instanceof Error) {
		return err.message || err.name;
	}
	return String(err);
}
