/**
 * Source of "now" for services. Tests substitute a controllable clock.
 */
export type Clock = () => Date

export const systemClock: Clock = () => new Date()
