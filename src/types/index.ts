export type { IAppConfig, IHistorySource } from "./config";
export type { IUsageRecord, IDepartmentShare, IAllocationResult, Identifier } from "./usage";
export type { CoreError, CoreErrorKind, CoreResult } from "./result";
