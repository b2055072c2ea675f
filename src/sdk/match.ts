/**
 * Type-safe matching utilities for SessionEffect.
 *
 * @example Exhaustive matching
 * ```ts
 * const line = matchEffect(effect, {
 *   chat:         (e) => `${e.sender}: ${e.content}`,
 *   peerFarewell: () => null,
 *   // ... every effect type must be handled, or it does not compile
 * });
 * ```
 *
 * @example Type predicate
 * ```ts
 * if (isEffectType(effect, "reply")) {
 *   effect.success; // narrowed to ReplyEffect
 * }
 * ```
 */

import type { SessionEffect } from "./effects.js";

/** Union of all effect discriminator strings. */
export type SessionEffectType = SessionEffect["type"];

/** Extract a specific effect interface by its type string. */
export type EffectOfType<T extends SessionEffectType> = Extract<SessionEffect, { type: T }>;

/** A visitor requiring a handler for every effect type. */
export type SessionEffectVisitor<R> = {
  [T in SessionEffectType]: (effect: EffectOfType<T>) => R;
};

/** Exhaustive effect matcher. A missing effect type is a compile error. */
export function matchEffect<R>(effect: SessionEffect, visitor: SessionEffectVisitor<R>): R {
  const handler = (visitor as Record<string, (effect: SessionEffect) => R>)[effect.type];
  return handler(effect);
}

/** Type predicate that narrows a `SessionEffect` to a specific variant. */
export function isEffectType<T extends SessionEffectType>(
  effect: SessionEffect,
  type: T,
): effect is EffectOfType<T> {
  return effect.type === type;
}

/** Exhaustive-check helper. Call it in the `default` branch of a switch. */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
