/**
 * PostgreSQL UserData repository
 *
 * Runs through any Queryable, normally a pg Pool wrapped by
 * instrumentQueryable so every statement is counted and timed.
 */

import { z } from 'zod'
import { Errors } from '../errors/index.js'
import type { Queryable } from '../instrumentation/index.js'
import { UserDataSchema, type UserData, type UserDataInput } from './schemas.js'
import type { UserDataRepository } from './repository.js'

const COLUMNS = 'id, name, email, message'

const RowsSchema = z.array(UserDataSchema)

export const CREATE_TABLE_SQL = `CREATE TABLE IF NOT EXISTS user_data (
  id SERIAL PRIMARY KEY,
  name VARCHAR(100) NOT NULL,
  email VARCHAR(255) NOT NULL,
  message TEXT NOT NULL
)`

export class PgUserDataRepository implements UserDataRepository {
  constructor(private readonly db: Queryable) {}

  private async rows(text: string, values?: unknown[]): Promise<UserData[]> {
    const result = await this.db.query(text, values)
    const parsed = RowsSchema.safeParse(result.rows)
    if (!parsed.success) {
      throw Errors.internal('Unexpected user_data row shape', { issues: parsed.error.issues })
    }
    return parsed.data
  }

  /** Create the table when it does not exist yet */
  async ensureSchema(): Promise<void> {
    await this.db.query(CREATE_TABLE_SQL)
  }

  async create(input: UserDataInput): Promise<UserData> {
    const [item] = await this.rows(
      `INSERT INTO user_data (name, email, message) VALUES ($1, $2, $3) RETURNING ${COLUMNS}`,
      [input.name, input.email, input.message]
    )
    if (!item) {
      throw Errors.internal('INSERT returned no row')
    }
    return item
  }

  list(skip: number, limit: number): Promise<UserData[]> {
    return this.rows(`SELECT ${COLUMNS} FROM user_data ORDER BY id OFFSET $1 LIMIT $2`, [skip, limit])
  }

  async update(id: number, input: UserDataInput): Promise<UserData | undefined> {
    const [item] = await this.rows(
      `UPDATE user_data SET name = $1, email = $2, message = $3 WHERE id = $4 RETURNING ${COLUMNS}`,
      [input.name, input.email, input.message, id]
    )
    return item
  }

  async remove(id: number): Promise<UserData | undefined> {
    const [item] = await this.rows(`DELETE FROM user_data WHERE id = $1 RETURNING ${COLUMNS}`, [id])
    return item
  }

  async ping(): Promise<void> {
    await this.db.query('SELECT 1')
  }
}
