import { PositionState } from '../types';
import { BaseRepository, DatabaseField, TableConfig } from './baseRepository';

export class StatePersistence extends BaseRepository {
  private static readonly POSITION_STATES: TableConfig = {
    name: 'position_states',
    conflictFields: ['owner'],
    hasLastUpdated: true,
  };

  private static readonly POSITION_FIELDS: DatabaseField<PositionState>[] = [
    { column: 'owner', extractor: (p) => p.owner },
    { column: 'collateral_value_usd', extractor: (p) => p.collateralValueInUsd },
    { column: 'debt', extractor: (p) => p.debt },
    { column: 'health_factor', extractor: (p) => p.healthFactor },
    { column: 'status', extractor: (p) => p.status },
    { column: 'risk_level', extractor: (p) => p.riskLevel },
    { column: 'liquidatable', extractor: (p) => p.liquidatable },
  ];

  async persistPositionStates(positions: PositionState[]): Promise<number> {
    return this.persistRows(StatePersistence.POSITION_STATES, positions, StatePersistence.POSITION_FIELDS);
  }
}
