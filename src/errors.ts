/**
 * A markup node has a shape the help schema has no slot for.
 * Fatal for the entity being converted, never for the batch.
 */
export class MalformedBlockError extends Error {
  constructor(message: string, public readonly nodeText: string) {
    super(`${message}:\n${nodeText}`);
    this.name = 'MalformedBlockError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class MetadataError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'MetadataError';
  }
}
