import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { canTransitionReservation, canTransitionUser } from './transitions.js';
import type { ReservationStatus, UserStatus } from '../types/contracts.js';

describe('canTransitionReservation', () => {
  const allStatuses: ReservationStatus[] = ['confirmed', 'cancelled', 'pending_review'];

  const allowedTransitions: Record<ReservationStatus, ReservationStatus[]> = {
    confirmed: ['cancelled'],
    cancelled: [],
    pending_review: []
  };

  it('should allow only confirmed -> cancelled', () => {
    for (const from of allStatuses) {
      for (const to of allStatuses) {
        const expected = allowedTransitions[from].includes(to);
        assert.equal(canTransitionReservation(from, to), expected, `Transition from ${from} to ${to}`);
      }
    }
  });

  it('should treat cancelled as terminal', () => {
    assert.equal(canTransitionReservation('cancelled', 'cancelled'), false);
    assert.equal(canTransitionReservation('cancelled', 'confirmed'), false);
  });
});

describe('canTransitionUser', () => {
  const allStatuses: UserStatus[] = ['pending', 'active'];

  it('should allow pending -> active and nothing else', () => {
    for (const from of allStatuses) {
      for (const to of allStatuses) {
        const expected = from === 'pending' && to === 'active';
        assert.equal(canTransitionUser(from, to), expected, `Transition from ${from} to ${to}`);
      }
    }
  });
});
