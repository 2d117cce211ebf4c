import { CollateralDepositedEvent, CollateralRedeemedEvent } from '../../../contracts/events';
import { BaseRepository, DatabaseField, TableConfig, Transformers } from './baseRepository';

export class EventPersistence extends BaseRepository {
  // ***** TABLE CONFIGURATIONS *****

  private static readonly EVENT_TABLES = {
    collateral_deposited: {
      name: 'collateral_deposited_events',
      conflictFields: ['tx_hash', 'log_index'],
      hasLastUpdated: false,
    },
    collateral_redeemed: {
      name: 'collateral_redeemed_events',
      conflictFields: ['tx_hash', 'log_index'],
      hasLastUpdated: false,
    },
  } satisfies Record<string, TableConfig>;

  // ***** FIELD MAPPINGS *****

  private static readonly COLLATERAL_DEPOSITED_FIELDS: DatabaseField<CollateralDepositedEvent>[] = [
    { column: 'tx_hash', extractor: (e) => e.txHash },
    { column: 'log_index', extractor: (e) => e.logIndex },
    { column: 'timestamp', extractor: (e) => Transformers.timestampToDate(e.timestamp) },
    { column: 'user_address', extractor: (e) => e.user },
    { column: 'token', extractor: (e) => e.token },
    { column: 'amount', extractor: (e) => e.amount },
  ];

  private static readonly COLLATERAL_REDEEMED_FIELDS: DatabaseField<CollateralRedeemedEvent>[] = [
    { column: 'tx_hash', extractor: (e) => e.txHash },
    { column: 'log_index', extractor: (e) => e.logIndex },
    { column: 'timestamp', extractor: (e) => Transformers.timestampToDate(e.timestamp) },
    { column: 'redeemed_from', extractor: (e) => e.redeemedFrom },
    { column: 'redeemed_to', extractor: (e) => e.redeemedTo },
    { column: 'token', extractor: (e) => e.token },
    { column: 'amount', extractor: (e) => e.amount },
  ];

  // ***** PERSISTENCE METHODS *****

  async persistCollateralDepositedEvents(events: CollateralDepositedEvent[]): Promise<number> {
    return this.persistRows(
      EventPersistence.EVENT_TABLES.collateral_deposited,
      events,
      EventPersistence.COLLATERAL_DEPOSITED_FIELDS,
    );
  }

  async persistCollateralRedeemedEvents(events: CollateralRedeemedEvent[]): Promise<number> {
    return this.persistRows(
      EventPersistence.EVENT_TABLES.collateral_redeemed,
      events,
      EventPersistence.COLLATERAL_REDEEMED_FIELDS,
    );
  }

  async persistAllEvents(eventsData: {
    collateralDepositedEvents: CollateralDepositedEvent[];
    collateralRedeemedEvents: CollateralRedeemedEvent[];
  }): Promise<void> {
    await this.persistCollateralDepositedEvents(eventsData.collateralDepositedEvents);
    await this.persistCollateralRedeemedEvents(eventsData.collateralRedeemedEvents);
  }
}
