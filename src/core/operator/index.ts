export { GunicornOperator, type GunicornOperatorOptions, type PreparedWorkload } from './gunicorn-operator';
export type { OperatorModel, OperatorEvent, RelationEventType } from './types';
