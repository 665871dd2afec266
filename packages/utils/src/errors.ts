export type SlashwatchErrorMetaData = Record<string, string | number | boolean | null>;

/**
 * Generic slashwatch error with attached metadata
 */
export class SlashwatchError<T extends {code: string}> extends Error {
  type: T;
  constructor(type: T, message?: string) {
    super(message || type.code);
    this.type = type;
  }

  getMetadata(): SlashwatchErrorMetaData {
    return this.type;
  }
}
