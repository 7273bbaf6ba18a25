import mongoose, { Schema, Document } from 'mongoose';
import { MAX_RATING, MIN_RATING, SENTIMENTS, Sentiment } from '../types/feedback.types';

export interface IFeedback extends Document {
  feedbackId: number;
  userName: string;
  email?: string;
  category: string;
  rating: number;
  message: string;
  sentiment: Sentiment;
  summary: string;
  aiResponse: string;
  recommendations?: string;
  createdAt: Date;
}

const FeedbackSchema: Schema = new Schema({
  feedbackId: { type: Number, required: true, unique: true },
  userName: { type: String, required: true, trim: true },
  email: { type: String },
  category: { type: String, required: true, index: true },
  rating: { type: Number, min: MIN_RATING, max: MAX_RATING, required: true },
  message: { type: String, required: true },
  sentiment: { type: String, enum: [...SENTIMENTS], default: 'neutral', index: true },
  summary: { type: String, default: '' },
  aiResponse: { type: String, default: '' },
  recommendations: { type: String },
  createdAt: { type: Date, default: Date.now, immutable: true }
});

FeedbackSchema.index({ createdAt: -1, feedbackId: -1 });
FeedbackSchema.index({ rating: 1, createdAt: -1 });

export default mongoose.model<IFeedback>('Feedback', FeedbackSchema);
