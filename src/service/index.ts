/**
 * Reference Service
 */

export { createService, type Service, type ServiceOptions } from './app.js'
export { main } from './main.js'
export { PgUserDataRepository, CREATE_TABLE_SQL } from './pg-repository.js'
export { MemoryUserDataRepository, type UserDataRepository } from './repository.js'
export {
  UserDataInputSchema,
  UserDataSchema,
  PaginationSchema,
  ItemIdSchema,
  type UserData,
  type UserDataInput,
  type Pagination,
} from './schemas.js'
