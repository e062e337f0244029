import { isIntentStale, type Intent } from "../types/intent.js";

interface Slot {
  intent: Intent;
  ticket: number;
}

/**
 * Single-slot holder for the current intent.
 *
 * Planner calls reserve a ticket before they start; a result is installed
 * only when its ticket is newer than the one behind the intent already held,
 * so a slow call that finishes late can never overwrite a fresher intent.
 * Intents are frozen before they are stored and replaced wholesale.
 */
export class IntentCell {
  private slot: Slot | undefined;
  private lastTicket = 0;

  reserve(): number {
    this.lastTicket += 1;
    return this.lastTicket;
  }

  replace(ticket: number, intent: Intent): boolean {
    if (ticket > this.lastTicket) {
      throw new RangeError(`Ticket ${ticket} was never reserved`);
    }
    if (this.slot && ticket <= this.slot.ticket) {
      return false;
    }
    this.slot = { intent: freezeIntent(intent), ticket };
    return true;
  }

  /** Current intent, or undefined when none is held or it went stale. */
  read(nowMs: number): Intent | undefined {
    if (!this.slot) return undefined;
    return isIntentStale(this.slot.intent, nowMs) ? undefined : this.slot.intent;
  }

  /** Last installed intent regardless of staleness. */
  peek(): Intent | undefined {
    return this.slot?.intent;
  }

  isExpired(nowMs: number): boolean {
    return this.slot !== undefined && isIntentStale(this.slot.intent, nowMs);
  }

  clear(): void {
    this.slot = undefined;
  }
}

function freezeIntent(intent: Intent): Intent {
  if (Object.isFrozen(intent)) return intent;
  const actions = Object.freeze(intent.actions.map((action) => Object.freeze({ ...action })));
  return Object.freeze({ ...intent, actions });
}
