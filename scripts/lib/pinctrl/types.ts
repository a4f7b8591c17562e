/** Locations a signal may be routed to: port index → pin indices. */
export type Pinout = Map<number, Set<number>>;

export interface SignalRoute {
  name: string;
  /** Bit gating this signal in the peripheral's ROUTEEN register; null until discovered. */
  enableBit: number | null;
  /** Word offset of the signal's ROUTE register relative to the peripheral base; null until discovered. */
  routeOffset: number | null;
  pinout: Pinout;
}

export interface PeripheralRoute {
  name: string;
  /** Word offset of the route-enable register, fixed by the first document that mentions it. */
  base: number;
  signals: Map<string, SignalRoute>;
}

export interface DbusModel {
  peripherals: Map<string, PeripheralRoute>;
}

export type ConsistencyPolicy = 'ignore' | 'warn' | 'error';

export const CONSISTENCY_POLICIES: readonly ConsistencyPolicy[] = ['ignore', 'warn', 'error'];

export interface ModelConflict {
  attribute: 'base' | 'enableBit' | 'routeOffset';
  /** PERIPHERAL or PERIPHERAL_SIGNAL */
  subject: string;
  kept: number;
  found: number;
  source: string;
}

export function createModel(): DbusModel {
  return { peripherals: new Map() };
}

export function ensurePeripheral(model: DbusModel, name: string, base: number): PeripheralRoute {
  let peripheral = model.peripherals.get(name);
  if (!peripheral) {
    peripheral = { name, base, signals: new Map() };
    model.peripherals.set(name, peripheral);
  }
  return peripheral;
}

export function ensureSignal(peripheral: PeripheralRoute, name: string): SignalRoute {
  let signal = peripheral.signals.get(name);
  if (!signal) {
    signal = { name, enableBit: null, routeOffset: null, pinout: new Map() };
    peripheral.signals.set(name, signal);
  }
  return signal;
}

export function addLocation(pinout: Pinout, port: number, pin: number): void {
  let pins = pinout.get(port);
  if (!pins) {
    pins = new Set();
    pinout.set(port, pins);
  }
  pins.add(pin);
}

/** Ports ascending, each with its pins ascending. */
export function sortedPinout(pinout: Pinout): Array<{ port: number; pins: number[] }> {
  return Array.from(pinout.entries())
    .sort(([a], [b]) => a - b)
    .map(([port, pins]) => ({ port, pins: Array.from(pins).sort((a, b) => a - b) }));
}
