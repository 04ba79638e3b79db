export interface ResponseFormatterOptions {
  defaultMinify: boolean;
  prettySpaces: number;
}

/**
 * Serializes JSON tool and resource output
 */
export class ResponseFormatter {
  private readonly options: ResponseFormatterOptions;

  constructor(options: Partial<ResponseFormatterOptions> = {}) {
    this.options = { defaultMinify: false, prettySpaces: 2, ...options };
  }

  format(value: unknown): string {
    return this.options.defaultMinify
      ? JSON.stringify(value)
      : JSON.stringify(value, null, this.options.prettySpaces);
  }
}

export const responseFormatter = new ResponseFormatter();
