export const REQUEST_METHODS = ['HEAD', 'OPTIONS', 'GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;

export type RequestMethod = (typeof REQUEST_METHODS)[number];

/** Methods whose requests carry a payload */
export type BodyRequestMethod = 'POST' | 'PUT' | 'PATCH';

export class Header {
  constructor(
    readonly name: string,
    readonly value: string
  ) {
    Object.freeze(this);
  }
}

/**
 * Base request. Headers keep insertion order and may repeat a name; every
 * entry is sent. The method is fixed by the concrete class.
 */
export abstract class Request<M extends RequestMethod = RequestMethod> {
  readonly headers: Header[] = [];

  protected constructor(
    readonly method: M,
    public url: string
  ) {}

  addHeader(name: string, value: string): this {
    this.headers.push(new Header(name, value));
    return this;
  }
}

export abstract class RequestWithBody<M extends BodyRequestMethod = BodyRequestMethod> extends Request<M> {
  protected constructor(
    method: M,
    url: string,
    /** Pre-encoded payload, sent as UTF-8 */
    public body: string
  ) {
    super(method, url);
  }
}

export class HeadRequest extends Request<'HEAD'> {
  constructor(url: string) {
    super('HEAD', url);
  }
}

export class OptionsRequest extends Request<'OPTIONS'> {
  constructor(url: string) {
    super('OPTIONS', url);
  }
}

export class GetRequest extends Request<'GET'> {
  constructor(url: string) {
    super('GET', url);
  }
}

export class DeleteRequest extends Request<'DELETE'> {
  constructor(url: string) {
    super('DELETE', url);
  }
}

export class PostRequest extends RequestWithBody<'POST'> {
  constructor(url: string, body: string) {
    super('POST', url, body);
  }
}

export class PutRequest extends RequestWithBody<'PUT'> {
  constructor(url: string, body: string) {
    super('PUT', url, body);
  }
}

export class PatchRequest extends RequestWithBody<'PATCH'> {
  constructor(url: string, body: string) {
    super('PATCH', url, body);
  }
}
