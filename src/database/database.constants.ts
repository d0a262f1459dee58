/** TypeORM connection names; also the store names used by the exporter and CLI */
export const SOURCE_CONNECTION = 'source';
export const TARGET_CONNECTION = 'target';

export type StoreName = typeof SOURCE_CONNECTION | typeof TARGET_CONNECTION;

export const STORE_NAMES: readonly StoreName[] = [SOURCE_CONNECTION, TARGET_CONNECTION];

export function isStoreName(value: string): value is StoreName {
  return value === SOURCE_CONNECTION || value === TARGET_CONNECTION;
}
