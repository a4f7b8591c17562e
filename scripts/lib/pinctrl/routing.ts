import type { Reporter } from '../diagnostics.js';
import { type PinSelector, type RoutingDocument, resolveLocation } from '../portio.js';
import { routingSignalName } from './renames.js';
import { type DbusModel, addLocation } from './types.js';

/** PRS channels are listed per signal, as modules named "PRS.<signal>". */
const PRS_PERIPHERAL = 'PRS0';
const PRS_PREFIX = 'PRS';

export interface RoutingQuery {
  module: string;
  selector: string;
  route: string;
}

export function routingQuery(peripheral: string, signal: string): RoutingQuery {
  const route = routingSignalName(signal);
  if (peripheral === PRS_PERIPHERAL) {
    return { module: `${PRS_PREFIX}.${signal}`, selector: `${PRS_PREFIX}_${route}`, route };
  }
  return { module: peripheral, selector: `${peripheral}_${route}`, route };
}

function findSelector(doc: RoutingDocument, query: RoutingQuery): PinSelector | undefined {
  for (const pinModule of doc.modules) {
    if (pinModule.name !== query.module) {
      continue;
    }
    const selector = pinModule.selectors.find((candidate) => candidate.name === query.selector);
    if (selector) {
      return selector;
    }
  }
  return undefined;
}

/**
 * Add the pin locations listed in one routing document to every signal the
 * model already knows. Signals the document does not mention are reported
 * and left as they are; nothing new is added to the model. Only the
 * locations of matched routes are checked.
 */
export function applyRoutingDocument(model: DbusModel, doc: RoutingDocument, reporter: Reporter): void {
  for (const peripheral of model.peripherals.values()) {
    for (const signal of peripheral.signals.values()) {
      const query = routingQuery(peripheral.name, signal.name);
      const selector = findSelector(doc, query);
      if (!selector) {
        reporter.warn(`No Pin Tool match for ${peripheral.name}_${signal.name} for ${doc.part}`);
        continue;
      }

      for (const route of selector.routes) {
        if (route.name !== query.route) {
          continue;
        }
        for (const location of route.locations) {
          const { portBankIndex, pinIndex } = resolveLocation(location, doc, `${selector.name}/${route.name}`);
          addLocation(signal.pinout, portBankIndex, pinIndex);
        }
      }
    }
  }
}
