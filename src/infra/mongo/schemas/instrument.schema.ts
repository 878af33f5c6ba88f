import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

@Schema({ collection: 'instruments', versionKey: false })
export class Instrument {
  _id!: Types.ObjectId;

  @Prop({ type: String, required: true, unique: true })
  symbol!: string;

  @Prop({ type: Boolean, default: true, index: true })
  active!: boolean;

  @Prop({ type: Date, default: () => new Date() })
  addedAt!: Date;

  /** 最近一次成功替换告警的时间；null = 还没刷新过 */
  @Prop({ type: Date, default: null })
  lastRefreshedAt!: Date | null;
}

export type InstrumentDocument = HydratedDocument<Instrument>;
export const InstrumentSchema = SchemaFactory.createForClass(Instrument);
