import { BaseEvent } from './state/Network';

export interface CollateralDepositedEvent extends BaseEvent {
  user: string;
  token: string;
  amount: bigint;
}

export interface CollateralRedeemedEvent extends BaseEvent {
  redeemedFrom: string;
  redeemedTo: string;
  token: string;
  amount: bigint;
}

export interface EngineEvents {
  CollateralDeposited: CollateralDepositedEvent;
  CollateralRedeemed: CollateralRedeemedEvent;
}

export type EngineEventName = keyof EngineEvents;

/** Event fields the engine supplies; the network adds the BaseEvent part on commit. */
export type EngineEventArgs<E extends EngineEventName> = Omit<EngineEvents[E], keyof BaseEvent>;
