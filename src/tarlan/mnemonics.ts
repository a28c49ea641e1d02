/**
 * Controller Mnemonic Table
 *
 * Static dispatch table from mnemonic to the action it has on the modeled
 * hardware, plus the documentation of every mnemonic the controllers know.
 * Both tables are built once, at module load.
 */

import type { ChannelNumber, Phase, SettingName } from '../types.js';
import { CHANNEL_NUMBERS } from '../types.js';

// =============================================================================
// Actions
// =============================================================================

export type ToggledStream = 'RF' | SettingName | `CH${ChannelNumber}`;

/** Receiver path index: 0 for AD1, 1 for AD2 */
export type ReceiverPath = 0 | 1;

export type MnemonicAction =
  | { kind: 'turnOn'; stream: ToggledStream }
  | { kind: 'turnOff'; stream: ToggledStream }
  | { kind: 'phase'; phase: Phase }
  | { kind: 'allOff' }
  | { kind: 'route'; path: ReceiverPath; channels: readonly ChannelNumber[] }
  | { kind: 'ncoSelect'; index: number }
  | { kind: 'transmitterFrequency'; index: number }
  | { kind: 'startFilters' }
  | { kind: 'noop' };

export const NCO_ENTRIES = 1024;
export const TRANSMITTER_FREQUENCIES = 16;
export const CONTROLLER_BITS = 32;

/** Raw bits that drive the ADC sample gate; of no interest for timing */
const SILENT_BITS = [4, 5];

function buildActions(): ReadonlyMap<string, MnemonicAction> {
  const actions = new Map<string, MnemonicAction>();
  const on = (stream: ToggledStream): MnemonicAction => ({ kind: 'turnOn', stream });
  const off = (stream: ToggledStream): MnemonicAction => ({ kind: 'turnOff', stream });
  const noop: MnemonicAction = { kind: 'noop' };

  actions.set('RFON', on('RF'));
  actions.set('RFOFF', off('RF'));
  actions.set('RXPROT', on('RXPROT'));
  actions.set('RXPOFF', off('RXPROT'));
  actions.set('LOPROT', on('LOPROT'));
  actions.set('LOPOFF', off('LOPROT'));
  actions.set('CALON', on('CAL'));
  actions.set('CAL100', on('CAL'));
  actions.set('CALOFF', off('CAL'));
  actions.set('CAL0', off('CAL'));
  actions.set('BEAMON', on('BEAM'));
  actions.set('BEAMOFF', off('BEAM'));

  actions.set('PHA0', { kind: 'phase', phase: 0 });
  actions.set('PHA180', { kind: 'phase', phase: 180 });
  actions.set('ALLOFF', { kind: 'allOff' });
  actions.set('STFIR', { kind: 'startFilters' });

  actions.set('AD1L', { kind: 'route', path: 0, channels: [1, 2, 3] });
  actions.set('AD1R', { kind: 'route', path: 0, channels: [4, 5, 6] });
  actions.set('AD2L', { kind: 'route', path: 1, channels: [1, 2, 3] });
  actions.set('AD2R', { kind: 'route', path: 1, channels: [4, 5, 6] });

  for (const ch of CHANNEL_NUMBERS) {
    actions.set(`CH${ch}`, on(`CH${ch}`));
    actions.set(`CH${ch}OFF`, off(`CH${ch}`));
  }

  // Not modeled: synchronization pulses, buffer handling, undocumented
  for (const name of ['TRANS', 'RECEV', 'RXSYNC', 'CHQPULS', 'TXSYNC', 'BUFLIP', 'STC']) {
    actions.set(name, noop);
  }
  for (let index = 0; index < TRANSMITTER_FREQUENCIES; index++) {
    actions.set(`F${index}`, { kind: 'transmitterFrequency', index });
  }
  for (let index = 0; index < NCO_ENTRIES; index++) {
    actions.set(`NCOSEL${index}`, { kind: 'ncoSelect', index });
  }
  for (const bit of SILENT_BITS) {
    for (const controller of ['R', 'T']) {
      actions.set(`B${controller}X${bit}`, noop);
      actions.set(`B${controller}X${bit}OFF`, noop);
    }
  }

  return actions;
}

export const MNEMONIC_ACTIONS: ReadonlyMap<string, MnemonicAction> = buildActions();

export function lookupMnemonic(mnemonic: string): MnemonicAction | undefined {
  return MNEMONIC_ACTIONS.get(mnemonic);
}

// =============================================================================
// Documentation
// =============================================================================

const FIXED_DOCS: Record<string, string> = {
  CHQPULS: 'High output on bit 31 for 2 us, used for synchronization with external hardware.',
  RXPROT: 'Enable receiver protector, bit 12 high',
  RXPOFF: 'Disable receiver protector, bit 12 low',
  LOPROT: 'Enable local oscillator protector, bit 6 high',
  LOPOFF: 'Disable local oscillator protector, bit 6 low',
  BEAMON: 'Enable beam in klystron, bit 13 high',
  BEAMOFF: 'Disable beam in klystron, bit 13 low',
  RFON: 'Enable RF output, bit 11 high',
  RFOFF: 'Disable RF output, bit 11 low',
  PHA0: 'Set proper phase, bit 4 low',
  PHA180: 'Set proper phase, bit 4 high',
  CALON: 'Main site and receivers: enable noise source for calibration, bit 15 high',
  CAL100: 'Enable noise source for calibration, bit 15 high',
  CALOFF: 'Main site and receivers: disable noise source, bit 15 low',
  CAL0: 'Disable noise source for calibration, bit 15 low',
  HCALON: 'Remote receivers: enable noise source in the horizontal wave guide only, high bit 1 high',
  HCALOFF: 'Remote receivers: disable noise source in the horizontal wave guide only, high bit 1 low',
  VCALON: 'Remote receivers: enable noise source in the vertical wave guide only, high bit 1 high',
  VCALOFF: 'Remote receivers: disable noise source in the vertical wave guide only, high bit 1 low',
  STC: 'Interrupt the crate computer to signal that new data are available, bit 8 high strobed',
  BUFLIP: 'Change side of buffer memory in channel boards, bit 17 high strobed',
  ALLOFF: 'Close sampling gate on all channel boards, bits 10-15 low',
  REP: 'End of the controller program, repeat the cycle',
  SETTCR: 'Set the reference time of the time control register',
  RXSYNC: 'A 2 us pulse on bit 31 on the front of the receiver controller',
  TXSYNC: 'A 2 us pulse on bit 31 on the front of the transmitter controller',
  AD1L: 'Route input from AD 1 to channel boards 1, 2, 3',
  AD1R: 'Route input from AD 1 to channel boards 4, 5, 6',
  AD2L: 'Route input from AD 2 to channel boards 1, 2, 3',
  AD2R: 'Route input from AD 2 to channel boards 4, 5, 6',
  STFIR: 'Start the FIR filters on the channel boards, required before using them, bit 16 strobed',
  TRANS: 'Not documented',
  RECEV: 'Not documented',
};

function buildDocs(): ReadonlyMap<string, string> {
  const docs = new Map<string, string>(Object.entries(FIXED_DOCS));

  for (let f = 0; f < TRANSMITTER_FREQUENCIES; f++) {
    docs.set(`F${f}`, 'Set transmitter frequency, bits 0-3 high');
  }
  for (let index = 0; index < NCO_ENTRIES; index++) {
    docs.set(`NCOSEL${index}`, 'Load the frequency defined in the requested memory into the NCO plus strobe bit 29');
  }
  for (const ch of CHANNEL_NUMBERS) {
    docs.set(`CH${ch}`, `Open sampling gate on channel board ${ch}, bit ${ch + 9} high`);
    docs.set(`CH${ch}OFF`, `Close sampling gate on channel board ${ch}, bit ${ch + 9} low`);
  }
  for (let bit = 0; bit < CONTROLLER_BITS; bit++) {
    docs.set(`BRX${bit}`, `Set bit ${bit} on receiver controller. No checks are made.`);
    docs.set(`BRX${bit}OFF`, `Clear bit ${bit} on receiver controller. No checks are made.`);
    docs.set(`BTX${bit}`, `Set bit ${bit} on transmitter controller. No checks are made. Use with caution.`);
    docs.set(`BTX${bit}OFF`, `Clear bit ${bit} on transmitter controller. No checks are made. Use with caution.`);
  }
  return docs;
}

export const MNEMONIC_DOCS: ReadonlyMap<string, string> = buildDocs();

export function describeMnemonic(mnemonic: string): string | undefined {
  return MNEMONIC_DOCS.get(mnemonic);
}

/** Documented mnemonics, optionally filtered by prefix, in table order */
export function listMnemonics(prefix: string = ''): string[] {
  return [...MNEMONIC_DOCS.keys()].filter((name) => name.startsWith(prefix.toUpperCase()));
}

/** Mnemonics that can be executed but have no documentation entry */
export function undocumentedMnemonics(): string[] {
  return [...MNEMONIC_ACTIONS.keys()].filter((name) => !MNEMONIC_DOCS.has(name));
}
