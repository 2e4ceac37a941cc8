import type {
  CarStatus,
  InquiryCloseReason,
  InquiryStatus,
  RentalStatus,
  SaleStatus,
  TestDriveStatus,
} from "@shared/schema";
import { InvalidTransitionError, ValidationError } from "./errors";

type TransitionTable<S extends string> = Readonly<Record<S, readonly S[]>>;

export const SALE_TRANSITIONS: TransitionTable<SaleStatus> = {
  pending: ["completed", "cancelled"],
  completed: [],
  cancelled: [],
};

export const RENTAL_TRANSITIONS: TransitionTable<RentalStatus> = {
  reserved: ["active", "cancelled"],
  active: ["returned", "cancelled"],
  returned: [],
  cancelled: [],
};

// new -> closed is listed but needs a close reason, see assertInquiryTransition
export const INQUIRY_TRANSITIONS: TransitionTable<InquiryStatus> = {
  new: ["contacted", "closed"],
  contacted: ["closed"],
  closed: [],
};

export const TEST_DRIVE_TRANSITIONS: TransitionTable<TestDriveStatus> = {
  scheduled: ["completed", "cancelled", "no_show"],
  completed: [],
  cancelled: [],
  no_show: [],
};

function assertNever(value: never): never {
  throw new Error(`Unexpected status: ${String(value)}`);
}

export function canTransition<S extends string>(table: TransitionTable<S>, from: S, to: S): boolean {
  return table[from].includes(to);
}

export function isTerminal<S extends string>(table: TransitionTable<S>, status: S): boolean {
  return table[status].length === 0;
}

export function assertTransition<S extends string>(
  entity: string,
  table: TransitionTable<S>,
  from: S,
  to: S
): void {
  if (canTransition(table, from, to)) {
    return;
  }

  if (from === to) {
    throw new InvalidTransitionError(entity, from, to, `the ${entity} is already ${from}`);
  }
  if (isTerminal(table, from)) {
    throw new InvalidTransitionError(entity, from, to, `"${from}" is a final status`);
  }
  throw new InvalidTransitionError(entity, from, to, `allowed next statuses are ${table[from].join(", ")}`);
}

export function assertInquiryTransition(
  from: InquiryStatus,
  to: InquiryStatus,
  closeReason?: InquiryCloseReason | null
): void {
  assertTransition("inquiry", INQUIRY_TRANSITIONS, from, to);

  if (from === "new" && to === "closed" && !closeReason) {
    throw new InvalidTransitionError(
      "inquiry",
      from,
      to,
      "an inquiry that was never contacted can only be closed with a close reason"
    );
  }
}

export function isOpenSale(status: SaleStatus): boolean {
  switch (status) {
    case "pending":
      return true;
    case "completed":
    case "cancelled":
      return false;
    default:
      return assertNever(status);
  }
}

// Pending and completed sales both hold the car; a car is sold at most once.
export function saleClaimsCar(status: SaleStatus): boolean {
  switch (status) {
    case "pending":
    case "completed":
      return true;
    case "cancelled":
      return false;
    default:
      return assertNever(status);
  }
}

export function isOpenRental(status: RentalStatus): boolean {
  switch (status) {
    case "reserved":
    case "active":
      return true;
    case "returned":
    case "cancelled":
      return false;
    default:
      return assertNever(status);
  }
}

/** Whether a new sale may be opened, or a pending one completed, on a car in this status. */
export function carAcceptsSale(status: CarStatus): boolean {
  switch (status) {
    case "available":
    case "reserved":
      return true;
    case "sold":
    case "rented":
      return false;
    default:
      return assertNever(status);
  }
}

/** `reserved` is the hold of a pending sale, so only an available car can be booked or handed over. */
export function carAcceptsRental(status: CarStatus): boolean {
  switch (status) {
    case "available":
      return true;
    case "reserved":
    case "sold":
    case "rented":
      return false;
    default:
      return assertNever(status);
  }
}

export function describeCarStatus(status: CarStatus): string {
  switch (status) {
    case "available":
      return "available";
    case "reserved":
      return "reserved by a pending sale";
    case "sold":
      return "already sold";
    case "rented":
      return "currently rented out";
    default:
      return assertNever(status);
  }
}

export interface DateRange {
  startDate: Date;
  endDate: Date;
}

export function assertValidRange(range: DateRange): void {
  const start = range.startDate.getTime();
  const end = range.endDate.getTime();

  if (Number.isNaN(start) || Number.isNaN(end)) {
    throw new ValidationError("Rental dates must be valid dates");
  }
  if (start >= end) {
    throw new ValidationError("Rental end date must be after the start date");
  }
}

// Half-open ranges: [s1, e1) and [s2, e2) overlap iff s1 < e2 and s2 < e1
export function rangesOverlap(a: DateRange, b: DateRange): boolean {
  return a.startDate.getTime() < b.endDate.getTime() && b.startDate.getTime() < a.endDate.getTime();
}

export function findOverlappingRental<T extends DateRange & { id: string; status: RentalStatus }>(
  rentals: readonly T[],
  range: DateRange,
  excludeRentalId?: string
): T | undefined {
  return rentals.find((rental) =>
    rental.id !== excludeRentalId &&
    isOpenRental(rental.status) &&
    rangesOverlap(rental, range)
  );
}

export function formatRange(range: DateRange): string {
  return `[${range.startDate.toISOString()}, ${range.endDate.toISOString()})`;
}
