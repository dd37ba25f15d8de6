/**
 * Display titles derived from instrument file names.
 *
 * Instrument exports are named with underscore-separated tokens, e.g.
 * `scan_2025_05_26_14_58_run_pico3.txt`: tokens 1–3 are the date, 4–5 the
 * time and the last character of token 7 the device number.
 */

function fileStem(fileName: string): string {
  const base = fileName.split(/[\\/]/).pop() ?? fileName;
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(0, dot) : base;
}

/**
 * `Pico <n> - <d1>/<d2>/<d3> <hh>:<mm>` for names that follow the convention,
 * the bare file stem otherwise.
 */
export function deriveDisplayTitle(fileName: string): string {
  const stem = fileStem(fileName);
  const [, first, second, third, hour, minute, , device] = stem.split('_');
  if (
    first === undefined ||
    second === undefined ||
    third === undefined ||
    hour === undefined ||
    minute === undefined ||
    !device
  ) {
    return stem;
  }
  return `Pico ${device.slice(-1)} - ${first}/${second}/${third} ${hour}:${minute.padStart(2, '0')}`;
}
