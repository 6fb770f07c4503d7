export const ERR_CONSUMED = `handle has been consumed and is no longer valid`;

/**
 * A move-only handle. Once consumed, every property access except the
 * identifying ones throws, so a stale reference fails loudly instead of
 * acting on resources that now belong to someone else.
 */
export abstract class Consumable {
  /*
   * Whether this handle has been consumed
   * and its resources moved elsewhere
   */
  _isConsumed: boolean;

  // called exactly once when the handle is consumed
  // note that this is internal and should not be called directly,
  // the proxy wraps it so the handle is marked consumed first
  abstract _handleConsume(): void;

  constructor() {
    this._isConsumed = false;

    // proxy helps us prevent access to properties after the handle has been consumed
    // e.g. if we hold a reference to a handle and try to use it after it's been moved
    return new Proxy(this, {
      get(target, prop) {
        // always allow access to _isConsumed, id, and state
        if (prop === '_isConsumed' || prop === 'id' || prop === 'state') {
          return Reflect.get(target, prop);
        }

        if (prop === '_handleConsume') {
          return () => {
            if (target._isConsumed) {
              throw new Error(`${ERR_CONSUMED}: consumed twice`);
            }

            target._isConsumed = true;
            target._handleConsume();
          };
        }

        if (target._isConsumed) {
          throw new Error(
            `${ERR_CONSUMED}: getting ${prop.toString()} on consumed handle`,
          );
        }

        return Reflect.get(target, prop);
      },
      set(target, prop, value) {
        if (target._isConsumed) {
          throw new Error(
            `${ERR_CONSUMED}: setting ${prop.toString()} on consumed handle`,
          );
        }

        return Reflect.set(target, prop, value);
      },
    });
  }
}
