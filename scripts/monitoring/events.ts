import { DSCEngine } from '../../contracts/DSCEngine';
import { CollateralDepositedEvent, CollateralRedeemedEvent } from '../../contracts/events';

export interface SystemEventsData {
  collateralDepositedEvents: CollateralDepositedEvent[];
  collateralRedeemedEvents: CollateralRedeemedEvent[];
}

export interface EventCollector {
  readonly events: SystemEventsData;
  /** Hand over what was collected so far and start a fresh batch. */
  drain(): SystemEventsData;
  stop(): void;
}

/** Buffers committed engine logs until they are persisted. */
export function collectEvents(engine: DSCEngine): EventCollector {
  let events: SystemEventsData = { collateralDepositedEvents: [], collateralRedeemedEvents: [] };

  const onDeposited = (log: CollateralDepositedEvent) => events.collateralDepositedEvents.push(log);
  const onRedeemed = (log: CollateralRedeemedEvent) => events.collateralRedeemedEvents.push(log);
  engine.on('CollateralDeposited', onDeposited);
  engine.on('CollateralRedeemed', onRedeemed);

  return {
    get events() {
      return events;
    },
    drain() {
      const drained = events;
      events = { collateralDepositedEvents: [], collateralRedeemedEvents: [] };
      return drained;
    },
    stop() {
      engine.off('CollateralDeposited', onDeposited);
      engine.off('CollateralRedeemed', onRedeemed);
    },
  };
}
