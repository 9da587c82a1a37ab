import { nanoid } from "nanoid";
import type { IdFactory } from "./repository.js";

export const ID_LENGTH = 16;

export const newId: IdFactory = (prefix) => `${prefix}_${nanoid(ID_LENGTH)}`;

export function timestamp(): string {
  return new Date().toISOString();
}

/** Copies `value` without its `undefined` entries. */
export function definedOnly<P extends object>(value: P): Partial<P> {
  const out: Partial<P> = {};
  for (const key in value) {
    const v = value[key];
    if (v !== undefined) out[key] = v;
  }
  return out;
}
