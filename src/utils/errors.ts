/** Custom error types for engine configuration and explicit lookups. */

export enum ErrorCode {
  // Validation errors
  VALIDATION_FAILED = 'VALIDATION_ERROR',

  // Configuration errors
  CONFIG_LOAD_FAILED = 'CONFIG_LOAD_FAILED',
  DUPLICATE_NODE = 'DUPLICATE_NODE',
  MISSING_ROOT_NODE = 'MISSING_ROOT_NODE',
  NODE_WITHOUT_OPTIONS = 'NODE_WITHOUT_OPTIONS',
  EMPTY_KEYWORD = 'EMPTY_KEYWORD',
  INVALID_SETTING = 'INVALID_SETTING',

  // Lookup errors
  UNKNOWN_NODE = 'UNKNOWN_NODE',

  // Generic
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export interface ErrorOptions {
  context?: Record<string, unknown>;
  suggestions?: string[];
  cause?: Error;
}

/** Base error class for all SupportFlow errors. */
export class SupportFlowError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;
  readonly suggestions: string[];

  constructor(message: string, code?: string, options?: ErrorOptions) {
    super(message);
    this.name = 'SupportFlowError';
    this.code = code || ErrorCode.UNKNOWN_ERROR;
    this.context = options?.context;
    this.suggestions = options?.suggestions || [];

    if (options?.cause) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8 engines
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Get a formatted error message with suggestions. */
  getDetailedMessage(): string {
    let msg = `[${this.code}] ${this.message}`;

    if (this.context && Object.keys(this.context).length > 0) {
      msg += `\nContext: ${JSON.stringify(this.context, null, 2)}`;
    }

    if (this.suggestions.length > 0) {
      msg += `\nSuggestions:\n${this.suggestions.map((s) => `  - ${s}`).join('\n')}`;
    }

    return msg;
  }

  /** Convert to a plain object for serialization. */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      suggestions: this.suggestions,
      stack: this.stack,
    };
  }
}

/** Error thrown when schema validation fails. */
export class ValidationError extends SupportFlowError {
  constructor(
    message: string,
    public readonly errors: string[]
  ) {
    super(message, ErrorCode.VALIDATION_FAILED, {
      context: { validationErrors: errors },
      suggestions: [
        'Check the validation errors for specific field issues',
        'Compare the file against data/default-engine.json',
      ],
    });
    this.name = 'ValidationError';
  }
}

/** Error thrown when dialogue content cannot be served. */
export class DialogueConfigError extends SupportFlowError {
  constructor(message: string, code: ErrorCode, context: Record<string, unknown>) {
    super(message, code, {
      context,
      suggestions: [
        'Every non-leaf node needs at least one option',
        'Node ids must be unique and include the root id',
      ],
    });
    this.name = 'DialogueConfigError';
  }
}

/** Error thrown when a configuration file cannot be read or parsed. */
export class ConfigLoadError extends SupportFlowError {
  constructor(filePath: string, cause?: Error) {
    super(
      `Failed to load engine config: ${filePath}${cause ? ` - ${cause.message}` : ''}`,
      ErrorCode.CONFIG_LOAD_FAILED,
      {
        context: { filePath },
        suggestions: [
          'Verify the file path is valid',
          'Make sure the file contains valid JSON',
        ],
        cause,
      }
    );
    this.name = 'ConfigLoadError';
  }
}

/** Error thrown by explicit lookups of a node id that is not in the graph. */
export class UnknownNodeError extends SupportFlowError {
  constructor(nodeId: string) {
    super(`Dialogue node "${nodeId}" not found`, ErrorCode.UNKNOWN_NODE, {
      context: { nodeId },
      suggestions: ['Use "supportflow stats" to list the loaded node count'],
    });
    this.name = 'UnknownNodeError';
  }
}
