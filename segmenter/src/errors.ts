/**
 * Error classes raised by language resolution and data loading.
 */

export class LanguageNotSupportedError extends Error {
  readonly language: string;

  constructor(language: string) {
    super(`Language \`${language}\` not supported`);
    this.name = 'LanguageNotSupportedError';
    this.language = language;
  }
}

export class LanguageDataMissingError extends Error {
  readonly language: string;

  constructor(language: string) {
    super(`No language data for \`${language}\``);
    this.name = 'LanguageDataMissingError';
    this.language = language;
  }
}

export class InteractiveModeError extends Error {
  constructor(
    message = 'Interactive mode is not available when `--input-file` or `--output-file` is passed',
  ) {
    super(message);
    this.name = 'InteractiveModeError';
  }
}
