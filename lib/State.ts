import type { SharedStateRecord } from './types/Channel';

/**
 * Shared application state
 *
 * A thin view over the record the hosting server owns. The record is never copied,
 * so writes made in a lifespan handler are visible to every request that receives
 * the same record. There is no locking; concurrent writers race.
 */
export class State {

  private readonly record: SharedStateRecord;

  public constructor(record: SharedStateRecord = {}) {
    this.record = record;
  }

  public get(key: string): unknown {
    return this.record[key];
  }

  public set(key: string, value: unknown): this {
    this.record[key] = value;
    return this;
  }

  public has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.record, key);
  }

  public delete(key: string): boolean {
    if (!this.has(key)) {
      return false;
    }

    delete this.record[key];
    return true;
  }

  public keys(): string[] {
    return Object.keys(this.record);
  }

  /**
   * The underlying record, by reference
   */
  public get raw(): SharedStateRecord {
    return this.record;
  }

}
