import { Consumable } from '../util/consumable';

/**
 * Sending half of a one-shot channel. Sending consumes the handle: a second
 * `send` (or any other use) throws.
 */
export class OneShotSender<T> extends Consumable {
  private resolve: (value: T) => void;
  private pendingValue?: { value: T };

  constructor(resolve: (value: T) => void) {
    super();
    this.resolve = resolve;
  }

  send(value: T): void {
    this.pendingValue = { value };
    this._handleConsume();
  }

  _handleConsume(): void {
    if (this.pendingValue) {
      this.resolve(this.pendingValue.value);
    }
  }
}

/**
 * Receiving half of a one-shot channel.
 */
export class OneShotReceiver<T> {
  private readonly promise: Promise<T>;
  private settled = false;

  constructor(promise: Promise<T>) {
    this.promise = promise.then((value) => {
      this.settled = true;
      return value;
    });
  }

  get isResolved(): boolean {
    return this.settled;
  }

  recv(): Promise<T> {
    return this.promise;
  }
}

export function oneshot<T = void>(): [OneShotSender<T>, OneShotReceiver<T>] {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });

  return [new OneShotSender(resolve), new OneShotReceiver(promise)];
}
