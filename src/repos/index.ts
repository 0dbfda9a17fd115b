export * from './cycles';
export * from './volunteers';
export * from './mentors';
export * from './clients';
export * from './team-roles';
export * from './relations';
export * from './jobs';
export * from './exports';
export * from './details';
export { deleteOwned, type OwnerKind } from './ownership';
export { ok, err, fail, translateSqliteError, type SqlParam } from './base';
