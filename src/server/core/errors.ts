/** Keyword source unreadable or unparseable. The engine carries on with an empty index. */
export class LoadError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to load keywords from ${source}: ${message}`, options);
    this.name = "LoadError";
    this.source = source;
  }
}

/** A phrase was looked up in an index it did not come from. */
export class IndexLookupMisuse extends Error {
  readonly phrase: string;

  constructor(phrase: string) {
    super(`Phrase "${phrase}" is not in this index`);
    this.name = "IndexLookupMisuse";
    this.phrase = phrase;
  }
}

/** The correction collaborator reported a failure or never answered. */
export class ApplicationError extends Error {
  readonly suggestionId: number;

  constructor(suggestionId: number, message: string, options?: { cause?: unknown }) {
    super(`Correction for suggestion #${suggestionId} failed: ${message}`, options);
    this.name = "ApplicationError";
    this.suggestionId = suggestionId;
  }
}

export class ConfigError extends Error {
  readonly file: string;

  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super(`Invalid configuration in ${file}: ${message}`, options);
    this.name = "ConfigError";
    this.file = file;
  }
}
