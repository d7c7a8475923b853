import type { CafeProfile } from '../config/env.js';
import type { KnownIntent } from './intentClassifier.js';
import type { ReservationRecord } from '../models/reservation.js';

export type InfoIntent = Extract<KnownIntent, 'menu' | 'hours' | 'location' | 'wifi'>;

export const INFO_INTENTS: readonly InfoIntent[] = ['menu', 'hours', 'location', 'wifi'];

/** Keypad shortcuts offered in the main menu. */
export const DIGIT_ROUTES: Record<string, InfoIntent | 'reservation' | 'human'> = {
  '1': 'reservation',
  '2': 'menu',
  '3': 'hours',
  '4': 'location',
  '5': 'wifi',
  '0': 'human',
};

export const SPEECH_HINTS =
  'reservation,book,booking,table,menu,vegan,hours,time,location,address,directions,wifi,order,speak to staff,agent,manager';

export function isInfoIntent(label: string): label is InfoIntent {
  return INFO_INTENTS.some((intent) => intent === label);
}

export function mainMenuPrompt(cafe: CafeProfile): string {
  return (
    `Hi, welcome to ${cafe.name}! ` +
    "You can say things like 'book a table for two at 7 p.m. today', " +
    "or ask for 'today's menu' or 'opening hours'. " +
    'Or press 1 for reservations, 2 for menu, 3 for hours, 4 for location, 5 for Wi-Fi, 0 to talk to staff.'
  );
}

export function infoAnswer(intent: InfoIntent, cafe: CafeProfile): string {
  switch (intent) {
    case 'menu':
      return `You can see our menu here: ${cafe.menuLink}. Anything else I can help with?`;
    case 'hours':
      return `Our opening hours are ${cafe.hours}. Anything else I can help with?`;
    case 'location':
      return `We are at ${cafe.address}. Anything else I can help with?`;
    case 'wifi':
      return `Here is the Wi-Fi information. ${cafe.wifiInfo}. Anything else?`;
  }
}

export const RESERVATION_PROMPT =
  "Great. Please say your booking like this: 'Book a table for two, tomorrow at 7 p.m., under the name Priya'.";

export const RESERVATION_RETRY =
  "Sorry, I could not get the reservation details. Please tell me how many people, and the day or time you'd like.";

export const NOT_UNDERSTOOD = "Sorry, I didn't get that.";

export const RESTART = "Okay, let's restart.";

export const BOOKING_CONFIRMED = 'Awesome. Your table is booked. We look forward to seeing you!';

export const CONNECTING_STAFF = 'Connecting you to our staff. Please hold.';

export const NO_STAFF_LINE = 'Sorry, no staff member is available to take your call right now.';

export const CALL_BACK_LATER =
  "Sorry, I'm having trouble understanding. Please call us back a little later. Goodbye!";

export const GOODBYE = 'Thanks for calling. Goodbye!';

export const TECHNICAL_ERROR = "Sorry, something went wrong on our side. Let's start again.";

export const PLEASE_REPEAT = "I'm sorry, I didn't quite catch that. Could you please repeat?";

export function describeReservation(record: ReservationRecord): string {
  const parts: string[] = [];
  if (record.partySize !== null) {
    parts.push(`${record.partySize} ${record.partySize === 1 ? 'person' : 'people'}`);
  }
  const when = [record.dateText, record.timeText ? `at ${record.timeText}` : null]
    .filter((part): part is string => Boolean(part))
    .join(' ');
  if (when) parts.push(when);
  if (record.name) parts.push(`under the name ${record.name}`);
  return parts.join(', ');
}

export function confirmationPrompt(record: ReservationRecord): string {
  return (
    `Let me confirm: ${describeReservation(record)}. ` +
    "If this is correct, say 'confirm'. To change, say 'change'."
  );
}
