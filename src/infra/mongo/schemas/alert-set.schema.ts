import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

import type { SignalKind } from '@/infra/types/market.types';

const SIGNAL_KINDS: SignalKind[] = [
  'OPEN_LONG',
  'CLOSE_LONG',
  'OPEN_SHORT',
  'CLOSE_SHORT',
];

@Schema({ _id: false, versionKey: false })
export class AlertEntry {
  @Prop({ type: String, required: true }) id!: string;
  @Prop({ type: String, required: true }) instrumentId!: string;
  @Prop({ type: String, required: true }) instrumentSymbol!: string;
  @Prop({ type: String, enum: SIGNAL_KINDS, required: true })
  kind!: SignalKind;
  @Prop({ type: String, required: true }) signalDate!: string;
  @Prop({ type: Number, required: true }) price!: number;
  @Prop({ type: Date, required: true }) createdAt!: Date;
}

export const AlertEntrySchema = SchemaFactory.createForClass(AlertEntry);

/**
 * 一个 instrument 一条文档，alerts 最多两项（OPEN + 其后的 CLOSE）。
 * 整组替换是单文档写入，天然原子。
 */
@Schema({ collection: 'alert_sets', versionKey: false })
export class AlertSet {
  @Prop({ type: String, required: true })
  _id!: string; // instrumentId

  @Prop({ type: String, index: true, required: true })
  symbol!: string;

  @Prop({ type: [AlertEntrySchema], default: [] })
  alerts!: AlertEntry[];

  @Prop({ type: Date, default: () => new Date() })
  updatedAt!: Date;
}

export type AlertSetDocument = HydratedDocument<AlertSet>;
export const AlertSetSchema = SchemaFactory.createForClass(AlertSet);

AlertSetSchema.index({ 'alerts.signalDate': -1 });
