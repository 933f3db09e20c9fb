import { describe, expect, it } from 'vitest';
import { parseItemForm } from './item-form';

const image = { filename: 'tv.png', content: Buffer.from('png') };
const fields = { name: 'Televisi', category: 'Elektronik', condition: 'new', price: '2500000' };

describe('parseItemForm', () => {
  it('accepts free-form category and condition', () => {
    const result = parseItemForm({ ...fields, category: 'Apa saja', condition: 'rusak ringan' }, image);

    expect(result).toEqual({
      ok: true,
      input: {
        name: 'Televisi',
        category: 'Apa saja',
        condition: 'rusak ringan',
        price: 2500000,
        description: null,
        image,
      },
    });
  });

  it('parses decimal and negative prices without range checks', () => {
    const decimal = parseItemForm({ ...fields, price: ' 19.99 ' }, image);
    const negative = parseItemForm({ ...fields, price: '-5' }, image);

    expect(decimal.ok && decimal.input.price).toBe(19.99);
    expect(negative.ok && negative.input.price).toBe(-5);
  });

  it('treats an empty description as absent', () => {
    const result = parseItemForm({ ...fields, description: '' }, image);

    expect(result.ok && result.input.description).toBeNull();
  });

  it('collects every missing field', () => {
    const result = parseItemForm({ name: '  ' });

    expect(result).toEqual({
      ok: false,
      issues: [
        { field: 'name', message: 'field required' },
        { field: 'category', message: 'field required' },
        { field: 'condition', message: 'field required' },
        { field: 'price', message: 'field required' },
        { field: 'image', message: 'field required' },
      ],
    });
  });

  it('rejects an image part without a filename', () => {
    const result = parseItemForm(fields, { ...image, filename: '' });

    expect(result).toEqual({ ok: false, issues: [{ field: 'image', message: 'field required' }] });
  });

  it('rejects hex, binary and octal prices', () => {
    for (const price of ['0x10', '0b11', '0o7']) {
      expect(parseItemForm({ ...fields, price }, image)).toEqual({
        ok: false,
        issues: [{ field: 'price', message: 'value is not a valid number' }],
      });
    }
  });

  it('accepts exponent and leading-dot prices', () => {
    const exponent = parseItemForm({ ...fields, price: '1.5e3' }, image);
    const leadingDot = parseItemForm({ ...fields, price: '.5' }, image);

    expect(exponent.ok && exponent.input.price).toBe(1500);
    expect(leadingDot.ok && leadingDot.input.price).toBe(0.5);
  });

  it('rejects infinite prices', () => {
    const result = parseItemForm({ ...fields, price: 'Infinity' }, image);

    expect(result).toEqual({ ok: false, issues: [{ field: 'price', message: 'value is not a valid number' }] });
  });
});
