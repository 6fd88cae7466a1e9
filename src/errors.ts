/**
 * latency-heatmap Error Classes
 *
 * Typed error hierarchy. Probe failures are not errors: they become failed
 * samples. Only invalid input and internal faults surface as exceptions.
 */

/** Base error context for all errors raised by this package */
export interface BaseErrorContext {
  message?: string;
  code?: string;
  statusCode?: number;
  original?: Error | unknown;
  description?: string;
  suggestion?: string;
  retriable?: boolean;
  [key: string]: unknown;
}

/** Serialized error format */
export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  statusCode: number;
  thrownAt: Date;
  retriable: boolean;
  suggestion?: string;
  description?: string;
  data: Record<string, unknown>;
  original?: unknown;
  stack?: string;
}

export class BaseError extends Error {
  thrownAt: Date;
  code?: string;
  statusCode: number;
  original?: Error | unknown;
  description?: string;
  suggestion?: string;
  retriable: boolean;
  data: Record<string, unknown>;

  constructor(context: BaseErrorContext) {
    const {
      message = 'Unknown error',
      code,
      statusCode,
      original,
      description,
      suggestion,
      retriable,
      ...rest
    } = context;

    super(message);

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    } else {
      this.stack = new Error(message).stack;
    }

    this.name = this.constructor.name;
    this.thrownAt = new Date();
    this.code = code;
    this.statusCode = statusCode ?? 500;
    this.original = original;
    this.description = description;
    this.suggestion = suggestion;
    this.retriable = retriable ?? false;
    this.data = {
      ...rest,
      message,
      suggestion: this.suggestion,
      retriable: this.retriable,
    };
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      thrownAt: this.thrownAt,
      retriable: this.retriable,
      suggestion: this.suggestion,
      description: this.description,
      data: this.data,
      original: this.original,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `${this.name} | ${this.message}`;
  }
}

export interface HeatmapErrorDetails {
  original?: Error | unknown;
  statusCode?: number;
  retriable?: boolean;
  suggestion?: string;
  description?: string;
  [key: string]: unknown;
}

export class HeatmapError extends BaseError {
  constructor(message: string, details: HeatmapErrorDetails = {}) {
    const original = details.original;
    const code = original instanceof Error && 'code' in original && typeof original.code === 'string'
      ? original.code
      : undefined;

    super({
      message,
      ...details,
      code,
      original,
    });
  }
}

export interface ConfigurationIssue {
  field: string;
  message: string;
  value?: unknown;
}

export class ConfigurationError extends HeatmapError {
  field?: string;
  value?: unknown;
  constraint?: string;
  issues: ConfigurationIssue[];

  constructor(
    message: string,
    details: HeatmapErrorDetails & { field?: string; value?: unknown; constraint?: string; issues?: ConfigurationIssue[] } = {}
  ) {
    const { field, value, constraint, issues = [], ...rest } = details;
    super(message, {
      statusCode: 422,
      retriable: false,
      suggestion: 'Fix the invocation parameters and run again.',
      field,
      value,
      constraint,
      ...rest,
    });
    this.field = field;
    this.value = value;
    this.constraint = constraint;
    this.issues = issues;
  }
}

export class ChannelClosedError extends HeatmapError {
  constructor(message = 'Cannot send to a closed channel', details: HeatmapErrorDetails = {}) {
    super(message, {
      retriable: false,
      description: 'Every producer already reported completion, so the consumer stopped reading.',
      ...details,
    });
  }
}

export class SamplingError extends HeatmapError {
  target?: string;

  constructor(message: string, details: HeatmapErrorDetails & { target?: string } = {}) {
    super(message, {
      retriable: false,
      suggestion: 'Check the prober implementation; probe failures must resolve, not throw outside a round.',
      ...details,
    });
    this.target = details.target;
  }
}
