import type { ItemFormInput } from './item-form';
import type { ItemRecord, ItemStore } from './item-store';
import type { FileSink } from './file-sink';

export interface ItemResponse extends ItemRecord {
  id: string;
}

export type CreateItemFailureKind = 'file_write_failed' | 'storage_failed';

export type CreateItemResult =
  | { ok: true; item: ItemResponse }
  | { ok: false; kind: CreateItemFailureKind; message: string; cause: unknown };

export interface CreateItemDeps {
  itemStore: ItemStore;
  fileSink: FileSink;
  uploadPublicPrefix: string;
}

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

export function buildImageUrl(prefix: string, filename: string) {
  return `${prefix}/${filename}`;
}

export function buildItemRecord(input: ItemFormInput, imageUrl: string): ItemRecord {
  return {
    name: input.name,
    category: input.category,
    condition: input.condition,
    price: input.price,
    description: input.description,
    image_url: imageUrl,
  };
}

/**
 * Stores the image, then inserts the record. A failed insert leaves the written file in place.
 */
export async function createItem(input: ItemFormInput, deps: CreateItemDeps): Promise<CreateItemResult> {
  const { filename, content } = input.image;
  try {
    await deps.fileSink.write(filename, content);
  } catch (err) {
    return { ok: false, kind: 'file_write_failed', message: errorMessage(err), cause: err };
  }

  const record = buildItemRecord(input, buildImageUrl(deps.uploadPublicPrefix, filename));

  let id: string;
  try {
    id = await deps.itemStore.insert(record);
  } catch (err) {
    return { ok: false, kind: 'storage_failed', message: errorMessage(err), cause: err };
  }

  return { ok: true, item: { id, ...record } };
}
