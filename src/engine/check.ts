import { Observable, throwError } from 'rxjs';
import { QuadStoreError } from '../api';

type AsyncMethod<T> = (this: T, ...args: any[]) => Promise<any>;
type RxMethod<T> = (this: T, ...args: any[]) => Observable<any>;

/**
 * Creates method decorators which reject calls when the assertion fails on the
 * method's `this`. Rejection is by a rejected promise or by an erroring
 * observable, according to the decorator used.
 */
export function check<T>(
  assertion: (t: T) => boolean,
  otherwise: () => Error
) {
  return {
    async: checkWith<T, AsyncMethod<T>>(assertion, otherwise, err => Promise.reject(err)),
    rx: checkWith<T, RxMethod<T>>(assertion, otherwise, err => throwError(() => err))
  };
}

export function checkWith<T, M extends (this: T, ...args: any[]) => any>(
  assertion: (t: T) => boolean,
  otherwise: () => Error,
  reject: (err: Error) => ReturnType<M>
) {
  return function (_t: object, _p: string, descriptor: TypedPropertyDescriptor<M>) {
    const method = descriptor.value;
    if (method == null)
      throw new TypeError('Only methods can be checked');
    descriptor.value = <M>function (this: T, ...args: any[]) {
      if (assertion(this))
        return method.apply(this, args);
      else
        return reject(otherwise());
    };
  };
}

export const checkNotClosed =
  check((m: { closed: boolean }) => !m.closed,
    () => new QuadStoreError('Executor closed'));
