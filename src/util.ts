import { Observable } from 'rxjs';
import cuid = require('cuid');

/**
 * Utility to generate a unique short UUID for use in a {@link QuadStoreConfig}
 *
 * @category Utility
 */
export function uuid() {
  return cuid();
}

/**
 * @returns a promise that settles when the observable completes or errors,
 * ignoring its values
 */
export function completed(observable: Observable<unknown>): Promise<void> {
  return new Promise((resolve, reject) =>
    observable.subscribe({ complete: resolve, error: reject }));
}
