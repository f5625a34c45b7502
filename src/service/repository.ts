/**
 * UserData storage
 */

import type { UserData, UserDataInput } from './schemas.js'

export interface UserDataRepository {
  create(input: UserDataInput): Promise<UserData>
  /** Items ordered by id */
  list(skip: number, limit: number): Promise<UserData[]>
  /** Resolves to undefined when no item has this id */
  update(id: number, input: UserDataInput): Promise<UserData | undefined>
  /** Deletes and returns the item, or undefined when absent */
  remove(id: number): Promise<UserData | undefined>
  /** Rejects when the backing store is unreachable */
  ping(): Promise<void>
}

/**
 * In-process repository, used by tests and local runs without PostgreSQL
 */
export class MemoryUserDataRepository implements UserDataRepository {
  private readonly items = new Map<number, UserData>()
  private nextId = 1

  async create(input: UserDataInput): Promise<UserData> {
    const item: UserData = { id: this.nextId++, ...input }
    this.items.set(item.id, item)
    return { ...item }
  }

  async list(skip: number, limit: number): Promise<UserData[]> {
    return Array.from(this.items.values())
      .slice(skip, skip + limit)
      .map((item) => ({ ...item }))
  }

  async update(id: number, input: UserDataInput): Promise<UserData | undefined> {
    if (!this.items.has(id)) return undefined
    const item: UserData = { id, ...input }
    this.items.set(id, item)
    return { ...item }
  }

  async remove(id: number): Promise<UserData | undefined> {
    const item = this.items.get(id)
    if (!item) return undefined
    this.items.delete(id)
    return item
  }

  async ping(): Promise<void> {}
}
