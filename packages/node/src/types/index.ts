/**
 * Type barrel — re-exports all public types from @intent-registry/node.
 */

// DTOs
export {
  AddressSchema,
  SymbolSchema,
  UintStringSchema,
  IdParamSchema,
  PaginationQuerySchema,
  LatestQuerySchema,
  RangeQuerySchema,
  BulkIdsSchema,
  IntentInputSchema,
  SubmitIntentSchema,
  SubmitBatchSchema,
  ExecuteIntentSchema,
  ListIntentsQuerySchema,
  DepositSchema,
  WithdrawSchema,
  SetAddressSchema,
  SetBoundsSchema,
  SetFeeSchema,
  SetPausedSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
} from "./dto.js";
export type {
  LatestQuery,
  RangeQuery,
  BulkIdsDto,
  IntentInputDto,
  SubmitIntentDto,
  SubmitBatchDto,
  ExecuteIntentDto,
  ListIntentsQuery,
  DepositDto,
  WithdrawDto,
  SetAddressDto,
  SetBoundsDto,
  SetFeeDto,
  SetPausedDto,
  ListEventsQuery,
  ListStreamEventsQuery,
} from "./dto.js";

// Views
export {
  toIntentView,
  toExecutionView,
  toConfigView,
  toSummaryView,
} from "./views.js";
export type {
  IntentView,
  ExecutionView,
  ConfigView,
  SummaryView,
} from "./views.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate, InvalidCursorError } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
  DecodedCursor,
} from "./pagination.js";

// Auth
export type { AuthType, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv, ValidatedEnv } from "./api-contract.js";
