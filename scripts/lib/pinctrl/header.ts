import type { Reporter } from '../diagnostics.js';
import { type DbusModel, sortedPinout } from './types.js';

export const DBUS_BINDINGS_INCLUDE = 'dt-bindings/pinctrl/silabs-pinctrl-dbus.h';

export interface RouteMacro {
  name: string;
  base: number;
  enableBit: number | null;
  routeOffset: number;
}

export interface LocationMacro {
  name: string;
  routeMacro: string;
  port: number;
  pin: number;
}

export interface PeripheralDefinitions {
  peripheral: string;
  routes: RouteMacro[];
  locations: LocationMacro[];
}

/** 0 -> "A", 1 -> "B", ... */
export function portLetter(port: number): string {
  if (!Number.isInteger(port) || port < 0 || port > 25) {
    throw new Error(`Port index ${port} has no letter`);
  }
  return String.fromCharCode('A'.charCodeAt(0) + port);
}

export function routeMacroName(peripheral: string, signal: string): string {
  return `SILABS_DBUS_${peripheral}_${signal}`;
}

export function locationMacroName(peripheral: string, signal: string, port: number, pin: number): string {
  return `${peripheral}_${signal}_P${portLetter(port)}${pin}`;
}

/**
 * Collect the definitions for every routable signal, peripherals and signals in
 * model order, locations by ascending port then pin. Signals without a route
 * register are reported and dropped.
 */
export function buildDefinitions(model: DbusModel, reporter: Reporter): PeripheralDefinitions[] {
  const definitions: PeripheralDefinitions[] = [];

  for (const peripheral of model.peripherals.values()) {
    const routes: RouteMacro[] = [];
    const locations: LocationMacro[] = [];

    for (const signal of peripheral.signals.values()) {
      if (signal.routeOffset === null) {
        reporter.warn(`No route register for ${peripheral.name}_${signal.name}`);
        continue;
      }

      const routeMacro = routeMacroName(peripheral.name, signal.name);
      routes.push({
        name: routeMacro,
        base: peripheral.base,
        enableBit: signal.enableBit,
        routeOffset: signal.routeOffset
      });

      if (signal.pinout.size === 0) {
        reporter.warn(`No pin locations for ${peripheral.name}_${signal.name}`);
        continue;
      }
      for (const { port, pins } of sortedPinout(signal.pinout)) {
        for (const pin of pins) {
          locations.push({
            name: locationMacroName(peripheral.name, signal.name, port, pin),
            routeMacro,
            port,
            pin
          });
        }
      }
    }

    definitions.push({ peripheral: peripheral.name, routes, locations });
  }

  return definitions;
}

export function formatRouteMacro(macro: RouteMacro): string {
  const enabled = macro.enableBit === null ? 0 : 1;
  const enableBit = macro.enableBit ?? 0;
  return `#define ${macro.name}(port, pin) SILABS_DBUS(port, pin, ${macro.base}, ${enabled}, ${enableBit}, ${macro.routeOffset})`;
}

export function formatLocationMacro(macro: LocationMacro): string {
  return `#define ${macro.name} ${macro.routeMacro}(${macro.port}, ${macro.pin})`;
}

export function renderPinctrlHeader(family: string, definitions: PeripheralDefinitions[]): string {
  const lines: string[] = [
    '/*',
    ` * Pin Control for Silicon Labs ${family} devices`,
    ' *',
    ' * SPDX-License-Identifier: Apache-2.0',
    ' */',
    '',
    `#include <${DBUS_BINDINGS_INCLUDE}>`
  ];

  for (const { routes } of definitions) {
    lines.push('');
    for (const macro of routes) {
      lines.push(formatRouteMacro(macro));
    }
  }

  for (const { locations } of definitions) {
    lines.push('');
    for (const macro of locations) {
      lines.push(formatLocationMacro(macro));
    }
  }

  lines.push('');
  return lines.join('\n');
}
