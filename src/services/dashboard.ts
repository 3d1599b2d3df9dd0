import type { Store } from "../store/store.js";
import type { CallIntent, Reservation, ReservationStatus } from "../types/contracts.js";

export type DashboardStats = {
  totalCalls: number;
  missedCalls: number;
  /** UTC hour "00".."23", ascending, hours without calls omitted */
  byHour: Array<{ hour: string; calls: number }>;
  byIntent: Array<{ intent: CallIntent; count: number }>;
  reservations: Record<ReservationStatus, number>;
  upcoming: Reservation[];
  pendingCount: number;
};

const UPCOMING_LIMIT = 10;

export function createDashboard(args: { store: Store; now?: () => Date }) {
  const now = args.now ?? (() => new Date());

  async function stats(businessId: string): Promise<DashboardStats> {
    const today = now().toISOString().slice(0, 10);
    const [calls, reservations, pending] = await Promise.all([
      args.store.listCalls(businessId),
      args.store.listReservations(businessId),
      args.store.listPending(businessId),
    ]);

    const hours = new Map<string, number>();
    const intents = new Map<CallIntent, number>();
    for (const c of calls) {
      const hour = new Date(c.timestamp);
      if (!Number.isNaN(hour.getTime())) {
        const h = String(hour.getUTCHours()).padStart(2, "0");
        hours.set(h, (hours.get(h) ?? 0) + 1);
      }
      intents.set(c.intent, (intents.get(c.intent) ?? 0) + 1);
    }

    const byStatus: Record<ReservationStatus, number> = { confirmed: 0, cancelled: 0, pending_review: 0 };
    for (const r of reservations) byStatus[r.status] += 1;

    return {
      totalCalls: calls.length,
      missedCalls: calls.filter((c) => c.outcome === "missed").length,
      byHour: [...hours].sort(([a], [b]) => a.localeCompare(b)).map(([hour, n]) => ({ hour, calls: n })),
      byIntent: [...intents]
        .sort(([a, x], [b, y]) => y - x || a.localeCompare(b))
        .map(([intent, count]) => ({ intent, count })),
      reservations: byStatus,
      upcoming: reservations.filter((r) => r.status === "confirmed" && r.date >= today).slice(0, UPCOMING_LIMIT),
      pendingCount: pending.length,
    };
  }

  return { stats };
}

export type Dashboard = ReturnType<typeof createDashboard>;
