import type { Reporter } from '../lib/diagnostics.js';
import { type VariantDocuments, applyVariant } from '../lib/pinctrl/aggregate.js';
import type { ExtractOptions } from '../lib/pinctrl/register_model.js';
import { type DbusModel, createModel } from '../lib/pinctrl/types.js';
import type { PinModule, RoutingDocument } from '../lib/portio.js';
import type { RegisterDocument } from '../lib/svd.js';

export interface CollectingReporter extends Reporter {
  infos: string[];
  warnings: string[];
}

export function collectingReporter(): CollectingReporter {
  const infos: string[] = [];
  const warnings: string[] = [];
  return {
    infos,
    warnings,
    info(message: string): void {
      infos.push(message);
    },
    warn(message: string): void {
      warnings.push(message);
    }
  };
}

/** The in-memory counterpart of `buildFamilyModel`. */
export function mergeVariants(variants: VariantDocuments[], options: ExtractOptions): DbusModel {
  const model = createModel();
  for (const documents of variants) {
    applyVariant(model, documents, options);
  }
  return model;
}

export interface FixtureRegister {
  name: string;
  /** byte offset */
  offset: number;
  fields?: Array<[name: string, bitOffset: number]>;
}

export function registerDoc(registers: FixtureRegister[], source = 'a.svd'): RegisterDocument {
  return {
    source,
    peripherals: [
      {
        name: 'GPIO_NS',
        registers: registers.map((register) => ({
          name: register.name,
          addressOffset: register.offset,
          fields: (register.fields ?? []).map(([name, bitOffset]) => ({ name, bitOffset }))
        }))
      }
    ]
  };
}

export interface FixtureRoute {
  module: string;
  selector: string;
  route: string;
  locations: Array<[port: number | string, pin: number | string]>;
}

export function routingDoc(routes: FixtureRoute[], part = 'part-a'): RoutingDocument {
  const modules: PinModule[] = [];
  for (const entry of routes) {
    let pinModule = modules.find((candidate) => candidate.name === entry.module);
    if (!pinModule) {
      pinModule = { name: entry.module, selectors: [] };
      modules.push(pinModule);
    }
    let selector = pinModule.selectors.find((candidate) => candidate.name === entry.selector);
    if (!selector) {
      selector = { name: entry.selector, routes: [] };
      pinModule.selectors.push(selector);
    }
    selector.routes.push({
      name: entry.route,
      locations: entry.locations.map(([portBankIndex, pinIndex]) => ({
        portBankIndex: String(portBankIndex),
        pinIndex: String(pinIndex)
      }))
    });
  }
  return { source: `${part}/PORTIO.portio`, part, modules };
}

function hex(value: number): string {
  return `0x${value.toString(16).toUpperCase()}`;
}

export function svdXml(registers: FixtureRegister[], peripheral = 'GPIO_NS'): string {
  const registerXml = registers
    .map((register) => {
      const fields = (register.fields ?? [])
        .map(
          ([name, bitOffset]) =>
            `            <field><name>${name}</name><bitOffset>${bitOffset}</bitOffset><bitWidth>1</bitWidth></field>`
        )
        .join('\n');
      return [
        '        <register>',
        `          <name>${register.name}</name>`,
        `          <addressOffset>${hex(register.offset)}</addressOffset>`,
        '          <fields>',
        fields,
        '          </fields>',
        '        </register>'
      ].join('\n');
    })
    .join('\n');

  return `<?xml version="1.0" encoding="utf-8"?>
<device>
  <name>TESTDEV</name>
  <peripherals>
    <peripheral>
      <name>${peripheral}</name>
      <baseAddress>0x5003C000</baseAddress>
      <registers>
${registerXml}
      </registers>
    </peripheral>
  </peripherals>
</device>`;
}

export function portioXml(routes: FixtureRoute[]): string {
  const doc = routingDoc(routes);
  const modules = doc.modules
    .map((pinModule) => {
      const selectors = pinModule.selectors
        .map((selector) => {
          const routeXml = selector.routes
            .map((route) => {
              const locations = route.locations
                .map(
                  (location) =>
                    `            <location portBankIndex="${location.portBankIndex}" pinIndex="${location.pinIndex}"/>`
                )
                .join('\n');
              return `          <route name="${route.name}">\n${locations}\n          </route>`;
            })
            .join('\n');
          return `        <selector name="${selector.name}">\n${routeXml}\n        </selector>`;
        })
        .join('\n');
      return `      <module name="${pinModule.name}">\n${selectors}\n      </module>`;
    })
    .join('\n');

  return `<?xml version="1.0" encoding="UTF-8"?>
<device>
  <portIo>
    <pinRoutes>
${modules}
    </pinRoutes>
  </portIo>
</device>`;
}
