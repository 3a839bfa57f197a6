export class MissingEndpointError extends Error {
  readonly source: string;
  readonly target: string;
  readonly missing: string[];

  constructor(source: string, target: string, missing: string[]) {
    super(`Cannot add edge "${source}" -> "${target}": missing node(s) ${missing.map(m => `"${m}"`).join(', ')}`);
    this.name = 'MissingEndpointError';
    this.source = source;
    this.target = target;
    this.missing = missing;
  }
}

export class UnknownNodeError extends Error {
  readonly label: string;

  constructor(label: string) {
    super(`No node labelled "${label}" in the graph`);
    this.name = 'UnknownNodeError';
    this.label = label;
  }
}

// Retryable: the graph is untouched and the label stays un-expanded.
export class ExpansionFailedError extends Error {
  readonly label: string;

  constructor(label: string, reason: string, cause?: unknown) {
    super(`Expansion of "${label}" failed: ${reason}`, { cause });
    this.name = 'ExpansionFailedError';
    this.label = label;
  }
}

export type PersistenceOperation = 'getTree' | 'getTreeById' | 'saveTree' | 'logSession' | 'query';

export class PersistenceError extends Error {
  readonly operation: PersistenceOperation;

  constructor(operation: PersistenceOperation, cause?: unknown) {
    super(`Storage ${operation} failed: ${describeError(cause)}`, { cause });
    this.name = 'PersistenceError';
    this.operation = operation;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err === undefined) return 'unknown error';
  return String(err);
}
