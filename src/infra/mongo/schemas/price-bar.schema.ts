import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

@Schema({ collection: 'price_bars', versionKey: false })
export class PriceBar {
  @Prop({ type: String, required: true })
  _id!: string; // `${instrumentId}|${date}`

  @Prop({ type: String, index: true, required: true })
  instrumentId!: string;

  @Prop({ type: String, required: true })
  date!: string; // YYYY-MM-DD，交易所时区

  @Prop({ type: Number, required: true }) open!: number;
  @Prop({ type: Number, required: true }) high!: number;
  @Prop({ type: Number, required: true }) low!: number;
  @Prop({ type: Number, required: true }) close!: number;
  @Prop({ type: Number, default: 0 }) volume!: number;

  // 写入时日期 < today 才是 final；当天的 bar 下次一定重拉
  @Prop({ type: Boolean, default: false })
  final!: boolean;

  @Prop({ type: Date, default: () => new Date() })
  createdAt!: Date;
}

export type PriceBarDocument = HydratedDocument<PriceBar>;
export const PriceBarSchema = SchemaFactory.createForClass(PriceBar);

PriceBarSchema.index({ instrumentId: 1, date: 1 }, { unique: true });
