import { Address } from '@Bazaar/type';

import type { Chain } from './chain';

export type CallOverrides = {
  value?: bigint;
};

/**
 * Wraps every method of `target` so it executes as a call from `sender`
 * to `address`, the way a contract binding signs for one account.
 */
export function bindCaller<T extends object>(
  target: T,
  chain: Chain,
  address: Address,
  sender: Address,
  overrides?: CallOverrides,
): T {
  const value = overrides?.value ?? 0n;
  return new Proxy(target, {
    get(obj, property) {
      const member: unknown = Reflect.get(obj, property);
      if (typeof member !== 'function') {
        return member;
      }
      return (...args: unknown[]): unknown =>
        chain.call(sender, address, value, () => member.apply(obj, args));
    },
  });
}
