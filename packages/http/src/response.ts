/**
 * Result of a successful (2xx) execution.
 *
 * Header names are lower case, as Node reports them. A header field that
 * appeared several times is joined into one comma-separated value.
 */
export class Response {
  readonly headers: Readonly<Record<string, string>>;

  constructor(
    readonly statusCode: number,
    readonly body: string,
    headers: Record<string, string>
  ) {
    this.headers = Object.freeze({ ...headers });
    Object.freeze(this);
  }

  header(name: string): string | undefined {
    return this.headers[name.toLowerCase()];
  }
}
