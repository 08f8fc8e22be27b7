/**
 * Named charsets for `strand generate --preset`.
 */
export const PRESETS = {
  alnum: '0123456789abcdefghijklmnopqrstuvwxyz',
  digits: '0123456789',
  hex: '0123456789abcdef',
  lower: 'abcdefghijklmnopqrstuvwxyz',
  upper: 'ABCDEFGHIJKLMNOPQRSTUVWXYZ',
  cyrillic: '0123456789абвгдеёжзийклмнопрстуфхцчшьщъыэюя',
} as const;

export type PresetName = keyof typeof PRESETS;

export const DEFAULT_PRESET: PresetName = 'alnum';

export function isPresetName(value: string): value is PresetName {
  return Object.prototype.hasOwnProperty.call(PRESETS, value);
}

export function listPresets(): Array<[PresetName, string]> {
  return Object.keys(PRESETS)
    .filter(isPresetName)
    .map((name): [PresetName, string] => [name, PRESETS[name]]);
}
