export class FareApiError extends Error {
  readonly status?: number;
  readonly url?: string;

  constructor(message: string, options: { status?: number; url?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FareApiError';
    this.status = options.status;
    this.url = options.url;
  }

  /** True when the API answered with a 4xx status. */
  get isClientError(): boolean {
    return this.status !== undefined && this.status >= 400 && this.status < 500;
  }

  /** True when the API answered at all, whatever the status. */
  get hasResponse(): boolean {
    return this.status !== undefined;
  }
}

export class InvalidBudgetError extends Error {
  readonly budget: unknown;

  constructor(budget: unknown) {
    super(`Could not convert budget to a number: ${typeof budget === 'string' ? JSON.stringify(budget) : String(budget)}`);
    this.name = 'InvalidBudgetError';
    this.budget = budget;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
