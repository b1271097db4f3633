import type { BookingRecord } from "./booking-types.ts";
import { UNKNOWN_CITY } from "./city-extract.ts";

const OTHER_CATEGORY = "Other / Unknown";
const OTHER_CITIES = "All Other Cities";
const MAX_LISTED_CITIES = 9;

const CHARGE_CATEGORIES: ReadonlyArray<{ label: string; keywords: readonly string[] }> = [
  {
    label: "DWI / Alcohol",
    keywords: ["DWI", "INTOX", "BAC", "DUI", "ALCOHOL", "DRUNK", "INTOXICATED", "PUBLIC INTOX", "OPEN CONT"],
  },
  {
    label: "Drugs / Possession",
    keywords: ["POSS", "POSS CS", "CONTROLLED SUB", "CS", "DRUG", "NARC", "MARIJ", "METH", "COCAINE", "HEROIN", "PARAPH"],
  },
  {
    label: "Family Violence / Assault",
    keywords: ["FAMILY", "FV", "ASSAULT", "AGG ASSAULT", "BODILY INJURY", "CHOKE", "STRANG", "DOMESTIC"],
  },
  {
    label: "Theft / Fraud",
    keywords: ["THEFT", "BURGL", "ROBB", "FRAUD", "FORGERY", "IDENTITY", "STOLEN", "SHOPLIFT"],
  },
  { label: "Weapons", keywords: ["WEAPON", "FIREARM", "GUN", "UCW", "UNL CARRYING"] },
  { label: "Evading / Resisting", keywords: ["EVADING", "RESIST", "INTERFER", "OBSTRUCT", "FLEE"] },
  {
    label: "Warrants / Court / Bond",
    keywords: ["WARRANT", "FTA", "FAIL TO APPEAR", "BOND", "PAROLE", "PROBATION"],
  },
];

export interface ShareEntry {
  label: string;
  percent: number;
  count: number;
}

export interface BookingStats {
  totalBookings: number;
  topCharge: string;
  chargeMix: ShareEntry[];
  cities: ShareEntry[];
}

export function analyzeBookings(records: readonly BookingRecord[]): BookingStats {
  const totalBookings = records.length;
  if (totalBookings === 0) {
    return { totalBookings, topCharge: "N/A", chargeMix: [], cities: [] };
  }

  return {
    totalBookings,
    topCharge: findTopCharge(records),
    chargeMix: summarizeChargeMix(records, totalBookings),
    cities: summarizeCities(records, totalBookings),
  };
}

/** Keyword matching is substring-based, so `BAC` also hits `TOBACCO`. */
export function categorizeCharges(charges: readonly string[]): string {
  const text = charges.join(", ").toUpperCase();
  const category = CHARGE_CATEGORIES.find(({ keywords }) =>
    keywords.some((keyword) => text.includes(keyword)),
  );
  return category?.label ?? OTHER_CATEGORY;
}

function findTopCharge(records: readonly BookingRecord[]): string {
  const firstCharges = records
    .filter((record) => record.charges.length > 0)
    .map((record) => record.charges[0].trim().toUpperCase());
  const [top] = countByLabel(firstCharges);
  return top ? top[0] : "N/A";
}

function summarizeChargeMix(records: readonly BookingRecord[], total: number): ShareEntry[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    const category = categorizeCharges(record.charges);
    counts.set(category, (counts.get(category) ?? 0) + 1);
  }

  return [...CHARGE_CATEGORIES.map(({ label }) => label), OTHER_CATEGORY]
    .map((label) => toShare(label, counts.get(label) ?? 0, total))
    .filter((entry) => entry.count > 0)
    .sort((left, right) => right.count - left.count);
}

function summarizeCities(records: readonly BookingRecord[], total: number): ShareEntry[] {
  const knownCities = records.map((record) => record.city).filter((city) => city !== UNKNOWN_CITY);
  const listed = countByLabel(knownCities)
    .slice(0, MAX_LISTED_CITIES)
    .map(([city, count]) => toShare(city, count, total));

  const listedCount = listed.reduce((sum, entry) => sum + entry.count, 0);
  const remaining = total - listedCount;
  return remaining > 0 ? [...listed, toShare(OTHER_CITIES, remaining, total)] : listed;
}

/** Counts in descending order; ties keep first-seen order. */
function countByLabel(labels: readonly string[]): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const label of labels) counts.set(label, (counts.get(label) ?? 0) + 1);
  return [...counts.entries()].sort((left, right) => right[1] - left[1]);
}

function toShare(label: string, count: number, total: number): ShareEntry {
  return { label, percent: Math.round((count / total) * 100), count };
}
