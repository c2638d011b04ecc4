import { v4 as uuidv4 } from "uuid";
import type { Logger } from "../logger.js";
import type { Amount, Campaign, PublicKeyLike } from "./types.js";

interface EventBase {
  /** Unique event id */
  id: string;
  /** Ledger time (unix seconds) at which the change was applied */
  at: number;
}

export interface CampaignCreatedEvent extends EventBase {
  type: "CampaignCreated";
  caller: PublicKeyLike;
  campaign: Campaign;
}

export interface DonationEvent extends EventBase {
  type: "Donation";
  caller: PublicKeyLike;
  value: Amount;
  index: number;
}

export interface CampaignEndedEvent extends EventBase {
  type: "CampaignEnded";
  index: number;
  benefactor: PublicKeyLike;
  amount: Amount;
}

export type LedgerEvent = CampaignCreatedEvent | DonationEvent | CampaignEndedEvent;

type DistributiveOmit<T, K extends keyof T> = T extends unknown ? Omit<T, K> : never;

export type LedgerEventPayload = DistributiveOmit<LedgerEvent, "id" | "at">;

export function makeEvent(payload: LedgerEventPayload, at: number): LedgerEvent {
  return { ...payload, id: uuidv4(), at };
}

/**
 * Receives ledger events for downstream indexing or UI. Delivery is
 * fire-and-forget: the ledger never waits on a sink, and a failing sink never
 * undoes the state change that produced the event.
 */
export interface NotificationSink {
  notify(event: LedgerEvent): void | Promise<void>;
}

/**
 * Hands an event to a sink, logging (not propagating) a throw or rejection.
 */
export function dispatch(sink: NotificationSink, event: LedgerEvent, logger: Logger): void {
  const onFailure = (err: unknown) => {
    logger.error({ err, eventId: event.id, eventType: event.type }, "Notification sink failed");
  };
  try {
    const pending = sink.notify(event);
    if (pending instanceof Promise) {
      void pending.catch(onFailure);
    }
  } catch (err) {
    onFailure(err);
  }
}

export class LoggingNotificationSink implements NotificationSink {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  notify(event: LedgerEvent): void {
    switch (event.type) {
      case "CampaignCreated":
        this.logger.info(
          { eventId: event.id, caller: event.caller, index: event.campaign.index, deadline: event.campaign.deadline },
          "CampaignCreated"
        );
        break;
      case "Donation":
        this.logger.info(
          { eventId: event.id, caller: event.caller, index: event.index, value: event.value },
          "Donation"
        );
        break;
      case "CampaignEnded":
        this.logger.info(
          { eventId: event.id, index: event.index, benefactor: event.benefactor, amount: event.amount },
          "CampaignEnded"
        );
        break;
    }
  }
}

export type EventListener = (event: LedgerEvent) => void;

/**
 * Keeps every event in memory and forwards it to subscribers.
 */
export class MemoryNotificationSink implements NotificationSink {
  private readonly events: LedgerEvent[] = [];
  private readonly listeners = new Set<EventListener>();

  notify(event: LedgerEvent): void {
    this.events.push(event);
    for (const listener of this.listeners) listener(event);
  }

  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getEvents(): LedgerEvent[] {
    return [...this.events];
  }

  eventsOfType<T extends LedgerEvent["type"]>(type: T): Extract<LedgerEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<LedgerEvent, { type: T }> => e.type === type);
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Delivers each event to several sinks; one failing sink does not stop the
 * others.
 */
export class FanOutNotificationSink implements NotificationSink {
  private readonly sinks: NotificationSink[];
  private readonly logger: Logger;

  constructor(sinks: NotificationSink[], logger: Logger) {
    this.sinks = [...sinks];
    this.logger = logger;
  }

  notify(event: LedgerEvent): void {
    for (const sink of this.sinks) dispatch(sink, event, this.logger);
  }
}
