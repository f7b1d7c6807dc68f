import mongoose, { Document, Schema } from 'mongoose';

export interface IBlobRecord extends Document {
  key: string;
  value: string;
  createdAt: Date;
  updatedAt: Date;
}

const blobRecordSchema = new Schema<IBlobRecord>(
  {
    key: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    value: {
      type: String,
      default: '',
    },
  },
  {
    timestamps: true,
    collection: 'blobs',
  }
);

export const BlobRecord = mongoose.model<IBlobRecord>('BlobRecord', blobRecordSchema);
