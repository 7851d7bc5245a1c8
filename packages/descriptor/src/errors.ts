export type DescriptorErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNDEFINED_PAYLOAD'
  | 'UNDEFINED_NETWORK'
  | 'UNMET_DEPENDENCY'
  | 'CIRCULAR_DEPENDENCY'
  | 'MANIFEST_INVALID'
  | 'MALFORMED_QUERY'
  | 'LOOKUP_FAILED'
  | 'RUNTIME_LOOKUP';

export type DescriptorErrorDetails = {
  code: DescriptorErrorCode;
  message: string;
  node?: string;
  path?: string;
  cause?: unknown;
};

export class DescriptorError extends Error {
  readonly code: DescriptorErrorCode;
  readonly node?: string;
  readonly path?: string;

  constructor(details: DescriptorErrorDetails) {
    super(details.message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = 'DescriptorError';
    this.code = details.code;
    this.node = details.node;
    this.path = details.path;
  }
}

export class ValidationError extends DescriptorError {
  readonly issues: string[];
  readonly unexpectedKeys: string[];
  readonly missingKeys: string[];

  constructor(params: { subject: string; issues: string[]; unexpectedKeys: string[]; missingKeys: string[] }) {
    super({ code: 'VALIDATION_ERROR', message: `Invalid ${params.subject}: ${params.issues.join('; ')}` });
    this.name = 'ValidationError';
    this.issues = params.issues;
    this.unexpectedKeys = params.unexpectedKeys;
    this.missingKeys = params.missingKeys;
  }
}

export class DescriptorReferenceError extends DescriptorError {
  constructor(details: Omit<DescriptorErrorDetails, 'code'> & { code: 'UNDEFINED_PAYLOAD' | 'UNDEFINED_NETWORK' }) {
    super(details);
    this.name = 'DescriptorReferenceError';
  }
}

export class UnmetDependencyError extends DescriptorError {
  readonly dependency: string;

  constructor(node: string, dependency: string) {
    super({ code: 'UNMET_DEPENDENCY', message: `Unmet \`depends_on\`: "${dependency}" in node: "${node}"`, node });
    this.name = 'UnmetDependencyError';
    this.dependency = dependency;
  }
}

export class CycleError extends DescriptorError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super({
      code: 'CIRCULAR_DEPENDENCY',
      message: `Node definitions contain a circular \`depends_on\`: ${cycle.join(' -> ')}`,
      node: cycle[0],
    });
    this.name = 'CycleError';
    this.cycle = cycle;
  }
}

export class ManifestError extends DescriptorError {
  readonly payload: string;

  constructor(payload: string, message: string, cause?: unknown) {
    super({ code: 'MANIFEST_INVALID', message: `\`${payload}\`: ${message}`, cause });
    this.name = 'ManifestError';
    this.payload = payload;
  }
}

export class GaomQueryError extends DescriptorError {
  constructor(query: string) {
    super({ code: 'MALFORMED_QUERY', message: `Malformed query: \`${query}\``, path: query });
    this.name = 'GaomQueryError';
  }
}

export class GaomLookupError extends DescriptorError {
  constructor(path: string) {
    super({ code: 'LOOKUP_FAILED', message: `Cannot retrieve \`${path}\`.`, path });
    this.name = 'GaomLookupError';
  }
}

export class GaomRuntimeLookupError extends DescriptorError {
  constructor(path: string) {
    super({
      code: 'RUNTIME_LOOKUP',
      message: `\`${path}\` is a runtime property and is only available in a runtime context.`,
      path,
    });
    this.name = 'GaomRuntimeLookupError';
  }
}

// Helper constructors for consistent error creation
export const Errors = {
  undefinedPayload: (node: string, payload: string) =>
    new DescriptorReferenceError({
      code: 'UNDEFINED_PAYLOAD',
      message: `Undefined payload: \`${payload}\` in node: \`${node}\``,
      node,
    }),
  undefinedNetwork: (node: string, network: string) =>
    new DescriptorReferenceError({
      code: 'UNDEFINED_NETWORK',
      message: `Undefined network: \`${network}\` in node: \`${node}\``,
      node,
    }),
  unmetDependency: (node: string, dependency: string) => new UnmetDependencyError(node, dependency),
  circularDependency: (cycle: string[]) => new CycleError(cycle),
};
