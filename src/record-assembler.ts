import {
  findBookingAnchors,
  looksLikeAddress,
  matchIdentifierDateOnly,
  matchNameIdentifierDate,
  matchNameOnly,
  splitNameAtBookingAnchor,
} from "./booking-patterns.ts";
import type { AssemblerState, BookingRecord, PendingIdentity, WorkingRecord } from "./booking-types.ts";
import { cleanChargeText } from "./charge-clean.ts";
import { extractCity } from "./city-extract.ts";
import { isJunkLine, normalizeSpacing } from "./line-normalize.ts";

const CHARGE_SEPARATOR_PATTERN = /^[\s-]+|[\s-]+$/g;

export function createAssemblerState(): AssemblerState {
  return { phase: { kind: "idle" }, records: [] };
}

export function assembleBookingRecords(lines: Iterable<string>): BookingRecord[] {
  let state = createAssemblerState();
  for (const line of lines) state = applyLine(state, line);
  return [...finishAssembly(state).records];
}

/**
 * Feeds one raw line through the state machine and returns the next state.
 * The given state is never modified, so earlier states stay valid. Junk and
 * empty lines return the state as is.
 */
export function applyLine(state: AssemblerState, rawLine: string): AssemblerState {
  const line = normalizeSpacing(rawLine);
  if (isJunkLine(line)) return state;
  const { phase } = state;

  const header = matchNameIdentifierDate(line);
  if (header) {
    const records = emitOpenRecord(state);
    return { phase: { kind: "open", record: startWorkingRecord(header.name, header) }, records };
  }

  const identity = matchIdentifierDateOnly(line);
  if (identity) {
    return { phase: { kind: "pending", identity }, records: emitOpenRecord(state) };
  }

  if (phase.kind === "pending") {
    if (matchNameOnly(line)) {
      return {
        phase: { kind: "open", record: startWorkingRecord(line, phase.identity) },
        records: state.records,
      };
    }
    return { phase: { kind: "idle" }, records: state.records };
  }

  if (phase.kind === "open") {
    return { phase: { kind: "open", record: applyContentLine(phase.record, line) }, records: state.records };
  }
  return state;
}

/** Emits the open record, if any. A pending identity that never got its name is dropped. */
export function finishAssembly(state: AssemblerState): AssemblerState {
  return { phase: { kind: "idle" }, records: emitOpenRecord(state) };
}

/** Returns a copy of `record` with the line routed to its address lines or charge fragments. */
export function applyContentLine(record: WorkingRecord, line: string): WorkingRecord {
  const anchors = findBookingAnchors(line);

  if (anchors.length > 0) {
    const beforeFirstAnchor = line.slice(0, anchors[0].start).trim();
    const addressLines =
      beforeFirstAnchor.length > 0 && looksLikeAddress(beforeFirstAnchor)
        ? [...record.addressLines, beforeFirstAnchor]
        : record.addressLines;

    const fragments = anchors
      .map((anchor, index) => {
        const end = index + 1 < anchors.length ? anchors[index + 1].start : line.length;
        return line.slice(anchor.end, end).replace(CHARGE_SEPARATOR_PATTERN, "");
      })
      .filter((fragment) => fragment.length > 0);

    return { ...record, addressLines, chargeFragments: [...record.chargeFragments, ...fragments] };
  }

  if (looksLikeAddress(line)) {
    return { ...record, addressLines: [...record.addressLines, line] };
  }

  const lastIndex = record.chargeFragments.length - 1;
  if (lastIndex < 0) return { ...record, chargeFragments: [line] };

  // Wrap continuation of the previous charge.
  return {
    ...record,
    chargeFragments: [
      ...record.chargeFragments.slice(0, lastIndex),
      `${record.chargeFragments[lastIndex]} ${line}`,
    ],
  };
}

export function finalizeRecord(record: WorkingRecord): BookingRecord {
  const addressLines = record.addressLines
    .map((line) => normalizeSpacing(line))
    .filter((line) => !isJunkLine(line));

  return Object.freeze({
    name: record.name.trim(),
    identifier: record.identifier.trim(),
    bookInDate: record.bookInDate.trim(),
    city: extractCity(addressLines),
    charges: Object.freeze(dedupeCharges(record.chargeFragments.map(cleanChargeText))),
  });
}

function startWorkingRecord(rawName: string, identity: PendingIdentity): WorkingRecord {
  const { name, remainder } = splitNameAtBookingAnchor(rawName);
  const record: WorkingRecord = {
    name,
    identifier: identity.identifier,
    bookInDate: identity.bookInDate,
    addressLines: [],
    chargeFragments: [],
  };
  return remainder.length > 0 ? applyContentLine(record, remainder) : record;
}

function emitOpenRecord(state: AssemblerState): readonly BookingRecord[] {
  if (state.phase.kind !== "open") return state.records;
  return [...state.records, finalizeRecord(state.phase.record)];
}

function dedupeCharges(charges: readonly string[]): string[] {
  const seen = new Set<string>();
  const distinct: string[] = [];
  for (const charge of charges) {
    const key = charge.toUpperCase();
    if (charge.length === 0 || seen.has(key)) continue;
    seen.add(key);
    distinct.push(charge);
  }
  return distinct;
}
