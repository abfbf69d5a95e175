import { AsyncSubject, firstValueFrom } from 'rxjs';

export class Future<T = void> implements PromiseLike<T> {
  private readonly subject = new AsyncSubject<T>();
  private _pending = true;
  private readonly _promise: Promise<T>;

  constructor() {
    this._promise = firstValueFrom(this.subject);
  }

  get pending() {
    return this._pending;
  }

  resolve = (value: T) => {
    this._pending = false;
    this.subject.next(value);
    this.subject.complete();
  };

  then: Promise<T>['then'] = (onfulfilled, onrejected) => {
    return this._promise.then(onfulfilled, onrejected);
  };
}
