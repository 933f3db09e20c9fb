export interface UploadedImage {
  filename: string;
  content: Buffer;
}

export interface ItemFormInput {
  name: string;
  category: string;
  condition: string;
  price: number;
  description: string | null;
  image: UploadedImage;
}

export interface ValidationIssue {
  field: string;
  message: string;
}

export type ParseItemFormResult =
  | { ok: true; input: ItemFormInput }
  | { ok: false; issues: ValidationIssue[] };

const REQUIRED_TEXT_FIELDS = ['name', 'category', 'condition'] as const;

const DECIMAL_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const present = (value: string | undefined): value is string => value !== undefined && value.trim() !== '';

/**
 * Checks the raw multipart fields. Only presence and the numeric price are enforced;
 * category and condition accept any string.
 */
export function parseItemForm(fields: Record<string, string>, image?: UploadedImage): ParseItemFormResult {
  const issues: ValidationIssue[] = [];

  for (const field of REQUIRED_TEXT_FIELDS) {
    if (!present(fields[field])) issues.push({ field, message: 'field required' });
  }

  const rawPrice = fields.price;
  let price = NaN;
  if (!present(rawPrice)) {
    issues.push({ field: 'price', message: 'field required' });
  } else {
    const trimmed = rawPrice.trim();
    price = DECIMAL_NUMBER.test(trimmed) ? Number(trimmed) : NaN;
    if (!Number.isFinite(price)) issues.push({ field: 'price', message: 'value is not a valid number' });
  }

  if (!image || !image.filename) issues.push({ field: 'image', message: 'field required' });

  if (issues.length > 0 || !image) return { ok: false, issues };

  const description = fields.description;
  return {
    ok: true,
    input: {
      name: fields.name,
      category: fields.category,
      condition: fields.condition,
      price,
      description: present(description) ? description : null,
      image,
    },
  };
}
