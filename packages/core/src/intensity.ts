/** JMA seismic intensity (shindo) scale, weakest to strongest. */
export const JMA_INTENSITY_MAP = {
  "0": 0,
  "1": 1,
  "2": 2,
  "3": 3,
  "4": 4,
  "5弱": 5,
  "5強": 6,
  "6弱": 7,
  "6強": 8,
  "7": 9,
} as const;

export type JmaLabel = keyof typeof JMA_INTENSITY_MAP;

export const UNKNOWN_RANK = -1;

export function isJmaLabel(label: string): label is JmaLabel {
  return Object.prototype.hasOwnProperty.call(JMA_INTENSITY_MAP, label);
}

/** Rank of a shindo label, or -1 for anything off the scale. */
export function jmaRank(label: string): number {
  return isJmaLabel(label) ? JMA_INTENSITY_MAP[label] : UNKNOWN_RANK;
}
