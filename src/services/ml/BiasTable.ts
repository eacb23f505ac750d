import { createRecord } from '../../models/records';
import { DataTable, jsonCodec, positiveNumberSchema } from '../../repositories/DataTable';
import { TableRegistry } from '../../repositories/TableRegistry';

export const BIAS_TABLE = 'bias';

export const DEFAULT_BIAS = 1;

/**
 * Per-category multipliers applied to observation ratios. Paul Graham's
 * original filter weighted the "good" category by 2.
 */
export class BiasTable {
  private constructor(readonly table: DataTable<number>) {}

  static async create(registry: TableRegistry): Promise<BiasTable> {
    return new BiasTable(await registry.addDataTable(BIAS_TABLE, jsonCodec(BIAS_TABLE, positiveNumberSchema)));
  }

  /**
   * Get the bias for a category, or set it when a value is given. Values
   * that are not positive finite numbers are ignored and the current (or
   * default) bias is returned.
   */
  async bias(category: string, value?: number): Promise<number> {
    if (value !== undefined && Number.isFinite(value) && value > 0) {
      await this.table.lock.withWrite(() => this.table.set(category, value));
      return value;
    }
    return this.table.lock.withRead(async () => (await this.table.get(category)) ?? DEFAULT_BIAS);
  }

  /**
   * Biases for the given categories. Callers hold the read lock.
   */
  async resolveUnlocked(categories: string[]): Promise<Record<string, number>> {
    const resolved = createRecord<number>();
    for (const category of categories) {
      resolved[category] = (await this.table.get(category)) ?? DEFAULT_BIAS;
    }
    return resolved;
  }

  async resolve(categories: string[]): Promise<Record<string, number>> {
    return this.table.lock.withRead(() => this.resolveUnlocked(categories));
  }
}
