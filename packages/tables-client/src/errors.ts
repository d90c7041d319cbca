export type TableCatalogErrorKind =
  | 'NotFound'
  | 'Conflict'
  | 'Forbidden'
  | 'BadRequest'
  | 'InternalServiceError'
  | 'CredentialsMissing'
  | 'Unknown';

export class TableCatalogError extends Error {
  readonly kind: TableCatalogErrorKind;
  readonly operation: string;
  readonly detail: string;
  readonly suggestion: string | null;

  constructor(
    operation: string,
    options: { kind: TableCatalogErrorKind; message: string; suggestion?: string | null; cause?: unknown }
  ) {
    const suggestion = options.suggestion ?? null;
    super(
      suggestion ? `${operation}: ${options.message} - ${suggestion}` : `${operation}: ${options.message}`,
      options.cause === undefined ? undefined : { cause: options.cause }
    );
    this.name = 'TableCatalogError';
    this.kind = options.kind;
    this.operation = operation;
    this.detail = options.message;
    this.suggestion = suggestion;
  }
}

type Classification = {
  kind: TableCatalogErrorKind;
  message: string;
  suggestion: string | null;
};

const NOT_FOUND: Classification = {
  kind: 'NotFound',
  message: 'resource not found',
  suggestion: 'verify the resource name and try again'
};

const CONFLICT: Classification = {
  kind: 'Conflict',
  message: 'resource already exists',
  suggestion: 'use a different name or check existing resources'
};

const FORBIDDEN: Classification = {
  kind: 'Forbidden',
  message: 'access denied',
  suggestion: 'check your AWS credentials and permissions'
};

const INTERNAL: Classification = {
  kind: 'InternalServiceError',
  message: 'AWS service error',
  suggestion: 'please retry the operation'
};

const INVALID_CREDENTIALS: Classification = {
  kind: 'CredentialsMissing',
  message: 'invalid AWS credentials',
  suggestion: 'check your AWS credentials configuration'
};

const MISSING_CREDENTIALS: Classification = {
  kind: 'CredentialsMissing',
  message: 'AWS credentials not configured',
  suggestion: "configure AWS credentials using 'aws configure' or environment variables"
};

const CREDENTIAL_KEYWORDS = [
  'no credentials',
  'credential',
  'nocredentialproviders',
  'sharedconfigprofilenotexist',
  'failed to refresh cached credentials'
];

function extractErrorName(error: unknown): string | undefined {
  if (!error || typeof error !== 'object') {
    return undefined;
  }
  if ('name' in error && typeof error.name === 'string' && error.name.length > 0 && error.name !== 'Error') {
    return error.name;
  }
  if ('Code' in error && typeof error.Code === 'string' && error.Code.length > 0) {
    return error.Code;
  }
  if ('code' in error && typeof error.code === 'string' && error.code.length > 0) {
    return error.code;
  }
  return undefined;
}

function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message.trim();
  }
  if (typeof error === 'string') {
    return error.trim();
  }
  return '';
}

function isCredentialMessage(message: string): boolean {
  const normalized = message.toLowerCase();
  return CREDENTIAL_KEYWORDS.some((keyword) => normalized.includes(keyword));
}

function classify(error: unknown): Classification {
  const name = extractErrorName(error);
  const message = extractErrorMessage(error);

  switch (name) {
    case 'NotFoundException':
      return NOT_FOUND;
    case 'ConflictException':
      return CONFLICT;
    case 'ForbiddenException':
    case 'AccessDeniedException':
    case 'AccessDenied':
      return FORBIDDEN;
    case 'BadRequestException':
    case 'ValidationException':
      return {
        kind: 'BadRequest',
        message: message || 'invalid request',
        suggestion: 'check your input parameters'
      };
    case 'InternalServerErrorException':
    case 'InternalServerError':
    case 'ServiceException':
      return INTERNAL;
    case 'UnrecognizedClientException':
    case 'InvalidSignatureException':
      return INVALID_CREDENTIALS;
    case 'CredentialsProviderError':
      return MISSING_CREDENTIALS;
    default:
      break;
  }

  if (isCredentialMessage(message)) {
    return MISSING_CREDENTIALS;
  }

  return {
    kind: 'Unknown',
    message: message || name || 'unknown error',
    suggestion: null
  };
}

/**
 * Converts any failure raised by the transport into a `TableCatalogError`.
 * Errors that are already classified pass through untouched.
 */
export function wrapCatalogError(operation: string, error: unknown): TableCatalogError {
  if (error instanceof TableCatalogError) {
    return error;
  }
  const classification = classify(error);
  return new TableCatalogError(operation, { ...classification, cause: error });
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof TableCatalogError && error.kind === 'NotFound';
}
