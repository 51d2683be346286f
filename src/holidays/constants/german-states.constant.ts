/**
 * German Federal States
 *
 * ISO 3166-2 subdivision codes (without the "DE-" prefix) with each state's
 * share of the national population. Shares weight the nationwide ("DE")
 * aggregation and sum to 1.
 */

export const STATE_CODES = [
  "BW",
  "BY",
  "BE",
  "BB",
  "HB",
  "HH",
  "HE",
  "MV",
  "NI",
  "NW",
  "RP",
  "SL",
  "SN",
  "ST",
  "SH",
  "TH",
] as const;

export type StateCode = (typeof STATE_CODES)[number];

/** Pseudo-region for holidays that apply in every state */
export const NATIONWIDE = "nationwide";

export type HolidayRegion = StateCode | typeof NATIONWIDE;

export interface GermanState {
  code: StateCode;
  /** Fraction of the German population living in the state */
  populationShare: number;
}

export const GERMAN_STATES: readonly GermanState[] = [
  { code: "BW", populationShare: 0.13352220384597055 },
  { code: "BY", populationShare: 0.15802030065986025 },
  { code: "BE", populationShare: 0.04406333514565102 },
  { code: "BB", populationShare: 0.030437977949884957 },
  { code: "HB", populationShare: 0.008179060146102285 },
  { code: "HH", populationShare: 0.022277401351699335 },
  { code: "HE", populationShare: 0.0756797745646923 },
  { code: "MV", populationShare: 0.01937073416520042 },
  { code: "NI", populationShare: 0.09624698474347271 },
  { code: "NW", populationShare: 0.215568075490225 },
  { code: "RP", populationShare: 0.04928614601803227 },
  { code: "SL", populationShare: 0.011833210668877029 },
  { code: "SN", populationShare: 0.026224318285684965 },
  { code: "ST", populationShare: 0.04878767948508131 },
  { code: "SH", populationShare: 0.03500539853084776 },
  { code: "TH", populationShare: 0.02549739894871785 },
];

/** State codes in lexicographic order, the order rows are emitted in */
export const SORTED_STATE_CODES: readonly StateCode[] = [...STATE_CODES].sort();

export function getPopulationShare(code: StateCode): number {
  const state = GERMAN_STATES.find((s) => s.code === code);
  return state ? state.populationShare : 0;
}

export function isStateCode(value: string): value is StateCode {
  return STATE_CODES.some((code) => code === value);
}
