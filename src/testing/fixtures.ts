import type { CafeProfile } from '../config/env.js';
import type { DialogueContext } from '../dialogue/manager.js';
import { RuleBasedIntentClassifier } from '../dialogue/intentClassifier.js';
import { RuleBasedReservationExtractor } from '../dialogue/reservationExtractor.js';
import type { ReservationRecord } from '../models/reservation.js';

export const TEST_CAFE: CafeProfile = {
  name: 'Test Cafe',
  hours: 'daily 8 AM to 9 PM',
  address: '12 Harbour Road',
  wifiInfo: 'Network: TestCafe, Password: test-secret',
  menuLink: 'https://cafe.test/menu',
};

export const STAFF_NUMBER = '+15550001111';

export function createDialogueContext(overrides: Partial<DialogueContext> = {}): DialogueContext {
  return {
    cafe: TEST_CAFE,
    classifier: new RuleBasedIntentClassifier(),
    extractor: new RuleBasedReservationExtractor(),
    staffNumber: STAFF_NUMBER,
    maxMisunderstandings: 2,
    maxUnassistedMisunderstandings: 0,
    ...overrides,
  };
}

export function createReservationFixture(overrides: Partial<ReservationRecord> = {}): ReservationRecord {
  return {
    partySize: 4,
    dateText: 'tomorrow',
    timeText: '7pm',
    name: 'Asha',
    rawUtterance: 'table for 4 tomorrow at 7pm under the name Asha',
    ...overrides,
  };
}
