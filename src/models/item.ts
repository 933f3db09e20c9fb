import { Schema, model, models, Model } from 'mongoose';

export interface IItem {
  name: string;
  category: string;
  condition: string;
  price: number;
  description: string | null;
  image_url: string;
}

const ItemSchema = new Schema<IItem>(
  {
    name: { type: String, required: true },
    // Free-form; the client offers choices such as "Elektronik"/"Pakaian" and "new"/"used".
    category: { type: String, required: true },
    condition: { type: String, required: true },
    price: { type: Number, required: true },
    description: { type: String, default: null },
    image_url: { type: String, required: true },
  },
  { timestamps: true },
);

export const Item: Model<IItem> = (models.Item as Model<IItem>) || model<IItem>('Item', ItemSchema, 'item');
