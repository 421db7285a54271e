export type { IEventStore } from '../kernel-core/L5/Audit.js';

/**
 * Environment Port: System Clock
 * Supplies the call timestamp, in seconds.
 */
export interface ISystemClock {
    now(): number;
}

export const systemClock: ISystemClock = {
    now: () => Math.floor(Date.now() / 1000)
};
