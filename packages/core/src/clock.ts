/**
 * Source of the current time. Injected so tests can pin timestamps and
 * statement periods.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
