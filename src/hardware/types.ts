/**
 * Raw entity state as pushed by the host platform
 */
export type EntityState = string | number | boolean | null;
