import mongoose, { Schema, type Model } from "mongoose";

export interface ItemDoc extends mongoose.Document {
  name: string;
  description?: string;
  available: boolean;
  ownerId: mongoose.Types.ObjectId;

  createdAt: Date;
  updatedAt: Date;
}

const ItemSchema = new Schema<ItemDoc>(
  {
    name: { type: String, required: true, trim: true, maxlength: 120 },
    description: { type: String, maxlength: 2000 },
    available: { type: Boolean, required: true, default: true },
    ownerId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
  },
  { timestamps: true, toJSON: { virtuals: true }, toObject: { virtuals: true } }
);

export const ItemModel: Model<ItemDoc> =
  mongoose.models.Item || mongoose.model<ItemDoc>("Item", ItemSchema);
