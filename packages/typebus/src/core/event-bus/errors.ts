import type { EventId } from "./types";

/**
 * A sealed value was opened by a token other than the one that sealed it.
 *
 * The bus always seals and opens with the same token, so only code calling
 * `seal`/`open` directly can hit this.
 */
export class EventContractError extends Error {
    readonly eventId: EventId;

    constructor(eventId: EventId, detail: string) {
        super(`[typebus] event contract violated for "${eventId}": ${detail}`);
        this.name = "EventContractError";
        this.eventId = eventId;
    }
}
