export {
  createStateModel,
  loadUnitState,
  parseUnitState,
  type StateModel,
  type UnitState,
} from './state-model';
