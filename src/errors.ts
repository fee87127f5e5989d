// Error codes
export enum ErrorCode {
  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_CONFIG_PATH = 'INVALID_CONFIG_PATH',
  MISSING_CREDENTIALS = 'MISSING_CREDENTIALS',

  // Script building errors
  UNSUPPORTED_OPERATION = 'UNSUPPORTED_OPERATION',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',

  // Execution errors
  EXECUTION_FAILED = 'EXECUTION_FAILED'
}

// Error messages
export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCode.INVALID_CONFIG]: 'Invalid configuration',
  [ErrorCode.INVALID_CONFIG_PATH]: 'Invalid config path',
  [ErrorCode.MISSING_CREDENTIALS]: 'Missing credentials',
  [ErrorCode.UNSUPPORTED_OPERATION]: 'Operation not supported in this mode',
  [ErrorCode.INVALID_ARGUMENT]: 'Invalid argument',
  [ErrorCode.EXECUTION_FAILED]: 'Script execution failed'
};

export type ErrorDetails = Record<string, unknown>;

export class ScripterError extends Error {
  readonly code: ErrorCode;
  readonly details?: ErrorDetails;

  constructor(code: ErrorCode, message?: string, details?: ErrorDetails) {
    super(message || ErrorMessages[code]);
    this.name = 'ScripterError';
    this.code = code;
    this.details = details;
  }
}

// Error factory
export class ErrorFactory {
  static createError(code: ErrorCode, message?: string, details?: ErrorDetails): ScripterError {
    return new ScripterError(code, message, details);
  }

  static isScripterError(error: unknown): error is ScripterError {
    return error instanceof ScripterError;
  }

  static invalidConfig(key: string, value: unknown): ScripterError {
    return this.createError(
      ErrorCode.INVALID_CONFIG,
      `Invalid configuration: ${key} = ${String(value)}`,
      { key, value }
    );
  }

  static invalidConfigPath(path: string): ScripterError {
    return this.createError(
      ErrorCode.INVALID_CONFIG_PATH,
      `Config path looks weird: ${path} ('~' is only expanded as the first path segment)`,
      { path }
    );
  }

  static noCredentialStore(): ScripterError {
    return this.createError(
      ErrorCode.INVALID_CONFIG,
      'Credentials can only be reset on a Scripter built with Scripter.create()'
    );
  }

  static missingCredentials(path: string, missing: string[]): ScripterError {
    return this.createError(
      ErrorCode.MISSING_CREDENTIALS,
      `Config file '${path}' is missing variables (${missing.join(', ')})\n` +
        'It should look like this:\n' +
        'username=youruser\n' +
        'password=yourpass\n\n' +
        'Or pass the missing values in when creating the Scripter.',
      { path, missing }
    );
  }

  static missingSite(): ScripterError {
    return this.createError(
      ErrorCode.INVALID_CONFIG,
      'No site to connect to. Pass a site or set CLUSTER_SCRIPTER_SITE.',
      { key: 'site' }
    );
  }

  static inputClosed(): ScripterError {
    return this.createError(
      ErrorCode.MISSING_CREDENTIALS,
      'Input ended before every question was answered'
    );
  }

  static unsupportedOperation(operation: string, mode: string): ScripterError {
    return this.createError(
      ErrorCode.UNSUPPORTED_OPERATION,
      `'${operation}' can only be used with mode='sftp' (current mode: '${mode}')`,
      { operation, mode }
    );
  }

  static invalidArgument(name: string, value: unknown, reason: string): ScripterError {
    return this.createError(
      ErrorCode.INVALID_ARGUMENT,
      `Invalid input (${String(value)}, type: ${typeof value}) for ${name}. ${reason}`,
      { name, value, reason }
    );
  }

  static executionFailed(shell: string, cause: Error): ScripterError {
    return this.createError(
      ErrorCode.EXECUTION_FAILED,
      `Failed to start ${shell}: ${cause.message}`,
      { shell, cause: cause.message }
    );
  }
}

// Error handler
export class ErrorHandler {
  static describe(error: unknown): string {
    if (ErrorFactory.isScripterError(error)) {
      return `[${error.code}] ${error.message}`;
    }
    return error instanceof Error ? error.message : String(error);
  }
}
