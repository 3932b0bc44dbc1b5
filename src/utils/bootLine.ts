/** Id of the inline JSON element the page carries the boot log in. */
export const BOOT_DATA_ID = 'boot-data';

export const bootTones = ['plain', 'ok', 'warning', 'prompt', 'blank'] as const;
export type BootTone = (typeof bootTones)[number];

export interface BootLine {
  text: string;
  tone: BootTone;
}

const isBootTone = (value: unknown): value is BootTone =>
  bootTones.some((tone) => tone === value);

// Kept free of zod: this module ships inside the inline page script.
export const isBootLine = (value: unknown): value is BootLine =>
  typeof value === 'object' &&
  value !== null &&
  'text' in value &&
  typeof value.text === 'string' &&
  'tone' in value &&
  isBootTone(value.tone);

export const toneOf = (text: string): BootTone => {
  if (text.trim() === '') return 'blank';
  if (text.startsWith('WARNING')) return 'warning';
  if (text.startsWith('>')) return 'prompt';
  if (text.endsWith('OK')) return 'ok';
  return 'plain';
};
