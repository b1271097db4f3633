export interface BookingRecord {
  readonly name: string;
  readonly identifier: string;
  readonly bookInDate: string;
  readonly city: string;
  readonly charges: readonly string[];
}

export interface WorkingRecord {
  readonly name: string;
  readonly identifier: string;
  readonly bookInDate: string;
  readonly addressLines: readonly string[];
  readonly chargeFragments: readonly string[];
}

/** Identifier and date seen before their name line. */
export interface PendingIdentity {
  identifier: string;
  bookInDate: string;
}

export type AssemblerPhase =
  | { kind: "idle" }
  | { kind: "pending"; identity: PendingIdentity }
  | { kind: "open"; record: WorkingRecord };

export interface AssemblerState {
  readonly phase: AssemblerPhase;
  readonly records: readonly BookingRecord[];
}

export interface BookedInReport {
  reportDate: Date;
  records: BookingRecord[];
}
