// The register descriptions and the pin routing data were authored separately
// and disagree on some names. Register-side names are rewritten on ingestion;
// routing-side names are only used when querying.

export const PERIPHERAL_RENAME: Readonly<Record<string, string>> = {
  FRC: 'PTI',
  LETIMER: 'LETIMER0',
  SYXO0: 'HFXO0'
};

export const SIGNAL_RENAME_REGISTERS: Readonly<Record<string, string>> = {
  CCC0: 'CDTI0',
  CCC1: 'CDTI1',
  CCC2: 'CDTI2',
  CCC3: 'CDTI3'
};

export const SIGNAL_RENAME_ROUTING: Readonly<Record<string, string>> = {
  ACMPOUT: 'DIGOUT',
  COLOUT0: 'COL_OUT_0',
  COLOUT1: 'COL_OUT_1',
  COLOUT2: 'COL_OUT_2',
  COLOUT3: 'COL_OUT_3',
  COLOUT4: 'COL_OUT_4',
  COLOUT5: 'COL_OUT_5',
  COLOUT6: 'COL_OUT_6',
  COLOUT7: 'COL_OUT_7',
  ROWSENSE0: 'ROW_SENSE_0',
  ROWSENSE1: 'ROW_SENSE_1',
  ROWSENSE2: 'ROW_SENSE_2',
  ROWSENSE3: 'ROW_SENSE_3',
  ROWSENSE4: 'ROW_SENSE_4',
  ROWSENSE5: 'ROW_SENSE_5',
  ANTROLLOVER: 'ANT_ROLL_OVER',
  ANTRR0: 'ANT_RR0',
  ANTRR1: 'ANT_RR1',
  ANTRR2: 'ANT_RR2',
  ANTRR3: 'ANT_RR3',
  ANTRR4: 'ANT_RR4',
  ANTRR5: 'ANT_RR5',
  ANTSWEN: 'ANT_SW_EN',
  ANTSWUS: 'ANT_SW_US',
  ANTTRIG: 'ANT_TRIG',
  ANTTRIGSTOP: 'ANT_TRIG_STOP',
  BUFOUTREQINASYNC: 'BUFOUT_REQ_IN_ASYNC',
  USBVBUSSENSE: 'USB_VBUS_SENSE'
};

function lookup(table: Readonly<Record<string, string>>, name: string): string {
  return Object.hasOwn(table, name) ? table[name] : name;
}

export function canonicalPeripheral(registerName: string): string {
  return lookup(PERIPHERAL_RENAME, registerName);
}

export function canonicalSignal(registerName: string): string {
  return lookup(SIGNAL_RENAME_REGISTERS, registerName);
}

export function routingSignalName(canonicalName: string): string {
  return lookup(SIGNAL_RENAME_ROUTING, canonicalName);
}
