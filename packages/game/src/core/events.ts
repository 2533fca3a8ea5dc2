import type { UltimateKind } from "@crawl/contracts";
import type { DamageType } from "../combat/damage";
import type { BossPhase } from "../entities/boss";
import type { StatusKind } from "../status/effects";
import { ConsoleLogger, type Logger } from "./logger";

export type EntityId = number;

/** The player is always entity 0; enemies count up from 1 */
export const PLAYER_ID: EntityId = 0;

export type GameEvent =
  | {
      readonly type: "combat.damage";
      readonly source: EntityId;
      readonly target: EntityId;
      readonly damage: number;
      readonly damageType: DamageType;
      readonly isCritical: boolean;
    }
  | {
      readonly type: "combat.death";
      readonly entity: EntityId;
      readonly name: string;
      readonly gold: number;
    }
  | {
      readonly type: "combat.heal";
      readonly entity: EntityId;
      readonly amount: number;
    }
  | {
      readonly type: "item.pickup";
      readonly itemName: string;
      readonly quantity: number;
    }
  | {
      readonly type: "item.drop";
      readonly itemName: string;
      readonly x: number;
      readonly y: number;
    }
  | {
      readonly type: "item.use";
      readonly itemName: string;
    }
  | {
      readonly type: "weapon.switched";
      readonly slot: number;
      readonly weaponName: string;
    }
  | {
      readonly type: "status.applied";
      readonly entity: EntityId;
      readonly status: StatusKind;
      readonly duration: number;
    }
  | {
      readonly type: "status.removed";
      readonly entity: EntityId;
      readonly status: StatusKind;
    }
  | {
      readonly type: "level.entered";
      readonly level: number;
      readonly boss: boolean;
    }
  | {
      readonly type: "boss.phase";
      readonly entity: EntityId;
      readonly phase: BossPhase;
    }
  | {
      readonly type: "boss.special";
      readonly entity: EntityId;
      readonly ability: string;
    }
  | {
      readonly type: "ultimate.used";
      readonly ultimate: UltimateKind;
    }
  | {
      readonly type: "run.paused";
      readonly paused: boolean;
    }
  | {
      readonly type: "run.ended";
      readonly outcome: "dead" | "victory";
    }
  | {
      readonly type: "message";
      readonly text: string;
    };

export type GameEventType = GameEvent["type"];

export type EventHandler<T extends GameEvent = GameEvent> = (event: T) => void;

type EventOfType<T extends GameEventType> = Extract<GameEvent, { type: T }>;

/** Delivery passes per flush before leftover events wait for the next one */
export const MAX_FLUSH_PASSES = 10;

/**
 * Events of one tick, held until the simulation flushes them.
 *
 * Delivery follows emission order: typed handlers first, then `onAny`
 * handlers. Events a handler emits go out in a later pass of the same
 * flush.
 *
 * @example
 * events.on("combat.death", (event) => {
 *   events.emit({ type: "message", text: `${event.name} dies` });
 * });
 * events.flush();
 */
export class EventQueue {
  private pending: GameEvent[] = [];
  private readonly handlers = new Map<GameEventType, EventHandler[]>();
  private readonly anyHandlers: EventHandler[] = [];
  private flushing = false;

  constructor(private readonly logger: Logger = new ConsoleLogger()) {}

  emit(event: GameEvent): void {
    this.pending.push(event);
  }

  /** Subscribe to one event type; returns the unsubscribe function */
  on<T extends GameEventType>(type: T, handler: EventHandler<EventOfType<T>>): () => void {
    const entry = handler as EventHandler;
    const list = this.handlers.get(type) ?? [];
    list.push(entry);
    this.handlers.set(type, list);
    return () => remove(list, entry);
  }

  onAny(handler: EventHandler): () => void {
    this.anyHandlers.push(handler);
    return () => remove(this.anyHandlers, handler);
  }

  /** Queued events of one type, oldest first */
  peek<T extends GameEventType>(type: T): EventOfType<T>[] {
    return this.pending.filter((event): event is EventOfType<T> => event.type === type);
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Deliver everything queued, then whatever the handlers emitted, for up
   * to `maxPasses` passes.
   *
   * @throws {Error} If called from inside a handler
   */
  flush(maxPasses: number = MAX_FLUSH_PASSES): void {
    if (this.flushing) {
      throw new Error("Cannot flush events from inside an event handler");
    }

    this.flushing = true;
    try {
      for (let pass = 0; pass < maxPasses && this.pending.length > 0; pass++) {
        const batch = this.pending;
        this.pending = [];
        for (const event of batch) {
          for (const handler of this.handlers.get(event.type) ?? []) handler(event);
          for (const handler of this.anyHandlers) handler(event);
        }
      }
    } finally {
      this.flushing = false;
    }

    if (this.pending.length > 0) {
      this.logger.warn("Events still pending after flush", {
        maxPasses,
        pending: this.pending.length,
      });
    }
  }
}

function remove(list: EventHandler[], handler: EventHandler): void {
  const index = list.indexOf(handler);
  if (index !== -1) list.splice(index, 1);
}
