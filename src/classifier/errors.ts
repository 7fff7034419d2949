/**
 * Error thrown when no classification profile exists for a language tag.
 */
export class UnsupportedLanguageError extends Error {
  override readonly name = 'UnsupportedLanguageError';
  readonly language: string;
  readonly supported: readonly string[];

  constructor(language: string, supported: readonly string[]) {
    super(`Unsupported language: ${language}. Supported: ${supported.join(', ')}`);
    this.language = language;
    this.supported = supported;
    Object.setPrototypeOf(this, UnsupportedLanguageError.prototype);
  }
}
