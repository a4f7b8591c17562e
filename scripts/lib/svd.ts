import fs from 'fs-extra';

import {
  type XmlNode,
  attributeOf,
  childNodes,
  childText,
  describeSource,
  isRecord,
  parseXml
} from './xml.js';

export interface SvdField {
  name: string;
  bitOffset: number;
}

export interface SvdRegister {
  name: string;
  /** Offset from the peripheral base, in bytes. */
  addressOffset: number;
  fields: SvdField[];
}

export interface SvdPeripheral {
  name: string;
  derivedFrom?: string;
  registers: SvdRegister[];
}

export interface RegisterDocument {
  source: string;
  peripherals: SvdPeripheral[];
}

const SVD_ARRAY_TAGS = ['peripheral', 'register', 'field'] as const;

/** SVD integers may be decimal, `0x` hex or `#` binary. */
export function parseSvdInteger(text: string | undefined): number | undefined {
  if (text === undefined) {
    return undefined;
  }
  const value = text.trim().toLowerCase();
  let parsed: number;
  if (/^0x[0-9a-f]+$/.test(value)) {
    parsed = Number.parseInt(value.slice(2), 16);
  } else if (/^#[01]+$/.test(value)) {
    parsed = Number.parseInt(value.slice(1), 2);
  } else if (/^\d+$/.test(value)) {
    parsed = Number.parseInt(value, 10);
  } else {
    return undefined;
  }
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

function fieldBitOffset(field: XmlNode): number | undefined {
  const bitOffset = parseSvdInteger(childText(field, 'bitOffset'));
  if (bitOffset !== undefined) {
    return bitOffset;
  }

  const lsb = parseSvdInteger(childText(field, 'lsb'));
  if (lsb !== undefined) {
    return lsb;
  }

  const bitRange = childText(field, 'bitRange')?.match(/^\[\s*(\d+)\s*:\s*(\d+)\s*\]$/);
  return bitRange ? Number.parseInt(bitRange[2], 10) : undefined;
}

function parseFields(register: XmlNode, source: string, registerName: string): SvdField[] {
  const fieldsNode = register.fields;
  if (!isRecord(fieldsNode)) {
    return [];
  }

  return childNodes(fieldsNode, 'field').map((field) => {
    const name = childText(field, 'name');
    if (!name) {
      throw new Error(`${source} register '${registerName}' has a field without a name`);
    }
    const bitOffset = fieldBitOffset(field);
    if (bitOffset === undefined) {
      throw new Error(`${source} field '${registerName}.${name}' has no bit position`);
    }
    return { name, bitOffset };
  });
}

function dimIndices(register: XmlNode, count: number): string[] {
  const listed = childText(register, 'dimIndex');
  if (!listed) {
    return Array.from({ length: count }, (_, index) => String(index));
  }
  const range = listed.match(/^(\d+)-(\d+)$/);
  if (range) {
    const start = Number.parseInt(range[1], 10);
    return Array.from({ length: count }, (_, index) => String(start + index));
  }
  return listed.split(',').map((token) => token.trim()).slice(0, count);
}

function parseRegisters(peripheral: XmlNode, source: string, peripheralName: string): SvdRegister[] {
  const registersNode = peripheral.registers;
  if (!isRecord(registersNode)) {
    return [];
  }

  const registers: SvdRegister[] = [];
  for (const register of childNodes(registersNode, 'register')) {
    const name = childText(register, 'name');
    if (!name) {
      throw new Error(`${source} peripheral '${peripheralName}' has a register without a name`);
    }
    const addressOffset = parseSvdInteger(childText(register, 'addressOffset'));
    if (addressOffset === undefined) {
      throw new Error(`${source} register '${peripheralName}.${name}' has no valid addressOffset`);
    }
    const fields = parseFields(register, source, name);

    const dim = parseSvdInteger(childText(register, 'dim'));
    if (dim === undefined) {
      registers.push({ name, addressOffset, fields });
      continue;
    }

    const increment = parseSvdInteger(childText(register, 'dimIncrement'));
    if (increment === undefined) {
      throw new Error(`${source} register '${peripheralName}.${name}' has dim without dimIncrement`);
    }
    dimIndices(register, dim).forEach((index, position) => {
      registers.push({
        name: name.replace(/\[%s\]|%s/g, index),
        addressOffset: addressOffset + position * increment,
        fields
      });
    });
  }

  return registers;
}

interface PeripheralEntry {
  name: string;
  derivedFrom?: string;
  node: XmlNode;
}

/**
 * Parse an SVD document. With `wanted`, only the named peripherals are
 * returned and only their registers (or those of the peripheral they derive
 * from) are read; other peripherals are never inspected.
 */
export function parseSvd(text: string, source: string, wanted?: readonly string[]): RegisterDocument {
  const label = describeSource(source);
  const doc = parseXml(text, source, SVD_ARRAY_TAGS);
  const device = doc.device;
  if (!isRecord(device)) {
    throw new Error(`${label} has no <device> element`);
  }
  const peripheralsNode = device.peripherals;
  if (!isRecord(peripheralsNode)) {
    throw new Error(`${label} has no <peripherals> element`);
  }

  const entries: PeripheralEntry[] = [];
  for (const node of childNodes(peripheralsNode, 'peripheral')) {
    const name = childText(node, 'name');
    if (!name) {
      if (wanted) {
        continue;
      }
      throw new Error(`${label} has a peripheral without a name`);
    }
    entries.push({ name, derivedFrom: attributeOf(node, 'derivedFrom'), node });
  }
  const byName = new Map(entries.map((entry) => [entry.name, entry]));

  const resolved = new Map<string, SvdRegister[]>();
  const resolve = (entry: PeripheralEntry, chain: string[]): SvdRegister[] => {
    const known = resolved.get(entry.name);
    if (known) {
      return known;
    }
    if (chain.includes(entry.name)) {
      throw new Error(`${label} peripheral '${entry.name}' is part of a derivedFrom cycle`);
    }

    let registers = parseRegisters(entry.node, label, entry.name);
    if (registers.length === 0 && entry.derivedFrom) {
      const base = byName.get(entry.derivedFrom);
      if (!base) {
        throw new Error(`${label} peripheral '${entry.name}' derives from unknown '${entry.derivedFrom}'`);
      }
      registers = resolve(base, [...chain, entry.name]);
    }
    resolved.set(entry.name, registers);
    return registers;
  };

  const selected = wanted ? entries.filter((entry) => wanted.includes(entry.name)) : entries;
  for (const entry of selected) {
    resolve(entry, []);
  }

  return {
    source,
    peripherals: selected.map((entry) => ({
      name: entry.name,
      derivedFrom: entry.derivedFrom,
      registers: resolved.get(entry.name) ?? []
    }))
  };
}

export async function readSvdFile(filePath: string, wanted?: readonly string[]): Promise<RegisterDocument> {
  const text = await fs.readFile(filePath, 'utf8');
  return parseSvd(text, filePath, wanted);
}
