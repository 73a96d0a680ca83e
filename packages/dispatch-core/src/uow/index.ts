export type {
  RaisedMessage,
  UnitOfWork,
  UnitOfWorkScopeInfo,
  UnitOfWorkFactory,
} from "./types.js";
export type { ScopeWork, ScopeResult } from "./withUnitOfWork.js";
export { withUnitOfWork } from "./withUnitOfWork.js";
