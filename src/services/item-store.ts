import { Item } from '../models/item';
import type { IItem } from '../models/item';

export type ItemRecord = IItem;

export interface ItemStore {
  /** Persists the record and returns the generated id. */
  insert(record: ItemRecord): Promise<string>;
}

export const mongoItemStore: ItemStore = {
  async insert(record) {
    const created = await Item.create(record);
    return String(created._id);
  },
};
