import type { Request } from './request.js';

/**
 * Mutates a request in place before it is dispatched: add headers, rewrite
 * the URL, edit the body. Errors thrown here are not caught by the client.
 */
export interface RequestInterceptor {
  intercept(request: Request): void;
}

/**
 * Ordered interceptors. `apply` walks a snapshot, so changes made while it runs
 * (including by an interceptor) take effect from the next application.
 */
export class InterceptorChain {
  private interceptors: RequestInterceptor[] = [];

  get size(): number {
    return this.interceptors.length;
  }

  add(interceptor: RequestInterceptor): void {
    this.interceptors.push(interceptor);
  }

  /** Removes the first registration of `interceptor`; returns whether one was found */
  remove(interceptor: RequestInterceptor): boolean {
    const index = this.interceptors.indexOf(interceptor);
    if (index === -1) return false;

    this.interceptors.splice(index, 1);
    return true;
  }

  clear(): void {
    this.interceptors = [];
  }

  apply(request: Request): void {
    for (const interceptor of [...this.interceptors]) {
      interceptor.intercept(request);
    }
  }
}
