import type { ReservationStatus, UserStatus } from "../types/contracts.js";

const reservationAllowed: Record<ReservationStatus, ReservationStatus[]> = {
  confirmed: ["cancelled"],
  cancelled: [],
  pending_review: [],
};

const userAllowed: Record<UserStatus, UserStatus[]> = {
  pending: ["active"],
  active: [],
};

export function canTransitionReservation(from: ReservationStatus, to: ReservationStatus): boolean {
  return reservationAllowed[from].includes(to);
}

export function canTransitionUser(from: UserStatus, to: UserStatus): boolean {
  return userAllowed[from].includes(to);
}
