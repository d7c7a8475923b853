/** Strictly greater: exactly `threshold` misunderstandings are still tolerated. */
export function shouldEscalate(counter: number, threshold: number, hasHumanLine: boolean): boolean {
  return counter > threshold && hasHumanLine;
}

/**
 * Without a staff line the menu would loop forever; a positive cap ends the
 * call instead. 0 keeps looping.
 */
export function shouldGiveUp(counter: number, cap: number, hasHumanLine: boolean): boolean {
  return !hasHumanLine && cap > 0 && counter > cap;
}
