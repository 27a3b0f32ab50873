import { EventEmitter } from 'node:events';

// Singleton event bus for non-fatal data findings
export const bus = new EventEmitter();

export const INTEGRITY_EVENT = 'integrity:warning';

export type IntegrityKind = 'unknown_category' | 'unknown_user' | 'out_of_window' | 'unknown_gender_code';

/** A non-fatal data-integrity finding. Never alters totals; only reports. */
export type DataIntegrityWarning = {
  kind: IntegrityKind;
  message: string;
  userId?: string;
  count: number;
};

export function emitIntegrity(w: DataIntegrityWarning): void {
  bus.emit(INTEGRITY_EVENT, w);
}

/** Collects warnings raised while `fn` runs; the listener is removed afterwards. */
export async function collectIntegrity<T>(fn: () => Promise<T>): Promise<{ value: T; warnings: DataIntegrityWarning[] }> {
  const warnings: DataIntegrityWarning[] = [];
  const onWarn = (w: DataIntegrityWarning) => { warnings.push(w); };
  bus.on(INTEGRITY_EVENT, onWarn);
  try {
    const value = await fn();
    return { value, warnings };
  } finally {
    bus.off(INTEGRITY_EVENT, onWarn);
  }
}
