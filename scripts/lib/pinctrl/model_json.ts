import { type DbusModel, sortedPinout } from './types.js';

export interface SignalJson {
  name: string;
  enableBit: number | null;
  routeOffset: number | null;
  pinout: Array<{ port: number; pins: number[] }>;
}

export interface PeripheralJson {
  name: string;
  base: number;
  signals: SignalJson[];
}

export interface ModelJson {
  family: string;
  variants: string[];
  peripherals: PeripheralJson[];
}

export function modelToJson(family: string, variants: string[], model: DbusModel): ModelJson {
  return {
    family,
    variants: [...variants],
    peripherals: Array.from(model.peripherals.values(), (peripheral) => ({
      name: peripheral.name,
      base: peripheral.base,
      signals: Array.from(peripheral.signals.values(), (signal) => ({
        name: signal.name,
        enableBit: signal.enableBit,
        routeOffset: signal.routeOffset,
        pinout: sortedPinout(signal.pinout)
      }))
    }))
  };
}
