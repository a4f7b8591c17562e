import fs from 'fs-extra';
import path from 'node:path';

import {
  type XmlNode,
  attributeOf,
  childNodes,
  describeSource,
  isRecord,
  parseXml
} from './xml.js';

/** Attribute text as written; checked by `resolveLocation` when a route is used. */
export interface PinLocation {
  portBankIndex: string;
  pinIndex: string;
}

export interface ResolvedLocation {
  portBankIndex: number;
  pinIndex: number;
}

export interface PinRoute {
  name: string;
  locations: PinLocation[];
}

export interface PinSelector {
  name: string;
  routes: PinRoute[];
}

export interface PinModule {
  name: string;
  selectors: PinSelector[];
}

export interface RoutingDocument {
  source: string;
  /** Part number the document describes, used in diagnostics. */
  part: string;
  modules: PinModule[];
}

const PORTIO_ARRAY_TAGS = ['module', 'selector', 'route', 'location'] as const;

function requireIndex(raw: string, attribute: string, label: string, context: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new Error(`${label} ${context} has invalid ${attribute} '${raw}'`);
  }
  return Number.parseInt(raw, 10);
}

/** Turn a location of `selector/route` into port and pin numbers. */
export function resolveLocation(location: PinLocation, doc: RoutingDocument, route: string): ResolvedLocation {
  const label = describeSource(doc.source);
  const context = `location of ${route}`;
  return {
    portBankIndex: requireIndex(location.portBankIndex, 'portBankIndex', label, context),
    pinIndex: requireIndex(location.pinIndex, 'pinIndex', label, context)
  };
}

function requireName(node: XmlNode, label: string, kind: string): string {
  const name = attributeOf(node, 'name');
  if (!name) {
    throw new Error(`${label} has a ${kind} without a name`);
  }
  return name;
}

function findPortIo(doc: XmlNode): XmlNode | undefined {
  if (isRecord(doc.portIo)) {
    return doc.portIo;
  }
  for (const [key, value] of Object.entries(doc)) {
    if (key.startsWith('?') || !isRecord(value)) {
      continue;
    }
    if (isRecord(value.portIo)) {
      return value.portIo;
    }
  }
  return undefined;
}

export function parsePortio(text: string, source: string, part: string): RoutingDocument {
  const label = describeSource(source);
  const doc = parseXml(text, source, PORTIO_ARRAY_TAGS);
  const portIo = findPortIo(doc);
  if (!portIo) {
    throw new Error(`${label} has no <portIo> element`);
  }
  const pinRoutes = portIo.pinRoutes;
  if (!isRecord(pinRoutes)) {
    throw new Error(`${label} has no <pinRoutes> element`);
  }

  const modules = childNodes(pinRoutes, 'module').map((moduleNode) => {
    const moduleName = requireName(moduleNode, label, 'module');
    const selectors = childNodes(moduleNode, 'selector').map((selectorNode) => {
      const selectorName = requireName(selectorNode, label, `selector in module '${moduleName}'`);
      const routes = childNodes(selectorNode, 'route').map((routeNode) => {
        const routeName = requireName(routeNode, label, `route in selector '${selectorName}'`);
        const locations = childNodes(routeNode, 'location').map((locationNode) => ({
          portBankIndex: attributeOf(locationNode, 'portBankIndex') ?? '',
          pinIndex: attributeOf(locationNode, 'pinIndex') ?? ''
        }));
        return { name: routeName, locations };
      });
      return { name: selectorName, routes };
    });
    return { name: moduleName, selectors };
  });

  return { source, part, modules };
}

/** The part name is the directory holding the PORTIO.portio file. */
export async function readPortioFile(filePath: string): Promise<RoutingDocument> {
  const text = await fs.readFile(filePath, 'utf8');
  return parsePortio(text, filePath, path.basename(path.dirname(filePath)));
}
