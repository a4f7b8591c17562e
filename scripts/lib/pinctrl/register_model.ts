import type { Reporter } from '../diagnostics.js';
import type { RegisterDocument, SvdRegister } from '../svd.js';
import { describeSource } from '../xml.js';
import { canonicalPeripheral, canonicalSignal } from './renames.js';
import {
  type ConsistencyPolicy,
  type DbusModel,
  type ModelConflict,
  ensurePeripheral,
  ensureSignal
} from './types.js';

/** Only the non-secure GPIO block carries the DBUS routing registers we need. */
export const GPIO_ROUTING_PERIPHERAL = 'GPIO_NS';

const ROUTE_ENABLE_SUFFIX = '_ROUTEEN';
const ROUTE_SUFFIX = 'ROUTE';
const ENABLE_FIELD_SUFFIX = 'PEN';

export type RegisterClass =
  | { kind: 'route-enable'; peripheral: string }
  | { kind: 'route'; peripheral: string; signal: string }
  | { kind: 'unrelated' };

/**
 * Classify a GPIO register by name. Names are returned as written in the
 * register description, before any renaming.
 *
 *   "TIMER0_ROUTEEN"  -> route-enable, peripheral TIMER0
 *   "TIMER0_CC0ROUTE" -> route, peripheral TIMER0, signal CC0
 *   "PORTA_CTRL"      -> unrelated
 */
export function classifyRegister(name: string): RegisterClass {
  if (name.endsWith(ROUTE_ENABLE_SUFFIX)) {
    const peripheral = name.slice(0, -ROUTE_ENABLE_SUFFIX.length);
    return peripheral ? { kind: 'route-enable', peripheral } : { kind: 'unrelated' };
  }

  if (name.endsWith(ROUTE_SUFFIX)) {
    const separator = name.indexOf('_');
    if (separator <= 0) {
      return { kind: 'unrelated' };
    }
    const peripheral = name.slice(0, separator);
    const signal = name.slice(separator + 1, -ROUTE_SUFFIX.length);
    return signal ? { kind: 'route', peripheral, signal } : { kind: 'unrelated' };
  }

  return { kind: 'unrelated' };
}

/** "CC0PEN" -> "CC0"; undefined for fields that do not enable a signal. */
export function enableFieldSignal(fieldName: string): string | undefined {
  if (!fieldName.endsWith(ENABLE_FIELD_SUFFIX)) {
    return undefined;
  }
  const signal = fieldName.slice(0, -ENABLE_FIELD_SUFFIX.length);
  return signal || undefined;
}

export function wordOffset(byteOffset: number): number {
  return Math.floor(byteOffset / 4);
}

export interface ExtractOptions {
  reporter: Reporter;
  consistency: ConsistencyPolicy;
}

const ATTRIBUTE_LABELS: Record<ModelConflict['attribute'], string> = {
  base: 'base',
  enableBit: 'enable bit',
  routeOffset: 'route offset'
};

export function formatConflict(conflict: ModelConflict): string {
  return `Inconsistent ${ATTRIBUTE_LABELS[conflict.attribute]} for ${conflict.subject}: kept ${conflict.kept}, ${conflict.source} has ${conflict.found}`;
}

function handleConflict(conflict: ModelConflict, options: ExtractOptions): void {
  if (options.consistency === 'ignore') {
    return;
  }
  if (options.consistency === 'error') {
    throw new Error(formatConflict(conflict));
  }
  options.reporter.warn(formatConflict(conflict));
}

interface ClassifiedRegister<K extends RegisterClass['kind']> {
  register: SvdRegister;
  offset: number;
  classification: Extract<RegisterClass, { kind: K }>;
}

function byOffset(
  a: { register: SvdRegister; offset: number },
  b: { register: SvdRegister; offset: number }
): number {
  return a.offset - b.offset || a.register.name.localeCompare(b.register.name);
}

/**
 * Merge the routing registers of one register description into `model`.
 * Attributes already present are kept; route-enable registers are applied
 * before route registers so the document's register order has no effect.
 */
export function applyRegisterDocument(
  model: DbusModel,
  doc: RegisterDocument,
  options: ExtractOptions
): void {
  const source = describeSource(doc.source);
  const gpio = doc.peripherals.find((peripheral) => peripheral.name === GPIO_ROUTING_PERIPHERAL);
  if (!gpio) {
    throw new Error(`${source} has no ${GPIO_ROUTING_PERIPHERAL} peripheral`);
  }

  const enableRegisters: Array<ClassifiedRegister<'route-enable'>> = [];
  const routeRegisters: Array<ClassifiedRegister<'route'>> = [];
  for (const register of gpio.registers) {
    const classification = classifyRegister(register.name);
    const offset = wordOffset(register.addressOffset);
    if (classification.kind === 'route-enable') {
      enableRegisters.push({ register, offset, classification });
    } else if (classification.kind === 'route') {
      routeRegisters.push({ register, offset, classification });
    }
  }
  enableRegisters.sort(byOffset);
  routeRegisters.sort(byOffset);

  // Route offsets are measured from this document's own base, so a shifted
  // register block is reported once, as a base conflict.
  const documentBases = new Map<string, number>();

  for (const { register, offset, classification } of enableRegisters) {
    const name = canonicalPeripheral(classification.peripheral);
    if (!documentBases.has(name)) {
      documentBases.set(name, offset);
    }
    const existing = model.peripherals.get(name);
    if (existing && existing.base !== offset) {
      handleConflict({ attribute: 'base', subject: name, kept: existing.base, found: offset, source }, options);
    }
    const peripheral = existing ?? ensurePeripheral(model, name, offset);

    for (const field of register.fields) {
      const rawSignal = enableFieldSignal(field.name);
      if (rawSignal === undefined) {
        continue;
      }
      const signal = ensureSignal(peripheral, canonicalSignal(rawSignal));
      if (signal.enableBit === null) {
        signal.enableBit = field.bitOffset;
      } else if (signal.enableBit !== field.bitOffset) {
        handleConflict(
          {
            attribute: 'enableBit',
            subject: `${name}_${signal.name}`,
            kept: signal.enableBit,
            found: field.bitOffset,
            source
          },
          options
        );
      }
    }
  }

  for (const { offset, classification } of routeRegisters) {
    const name = canonicalPeripheral(classification.peripheral);
    const documentBase = documentBases.get(name) ?? model.peripherals.get(name)?.base ?? offset;
    documentBases.set(name, documentBase);
    const peripheral = ensurePeripheral(model, name, documentBase);
    const signal = ensureSignal(peripheral, canonicalSignal(classification.signal));
    const routeOffset = offset - documentBase;
    if (signal.routeOffset === null) {
      signal.routeOffset = routeOffset;
    } else if (signal.routeOffset !== routeOffset) {
      handleConflict(
        {
          attribute: 'routeOffset',
          subject: `${peripheral.name}_${signal.name}`,
          kept: signal.routeOffset,
          found: routeOffset,
          source
        },
        options
      );
    }
  }
}
