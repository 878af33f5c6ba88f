import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * 已向 provider 请求过的历史区间（只记 today 之前）。
 * 区间内没有 bar 的日期视为休市 / 未上市，不再重复请求。
 */
@Schema({ collection: 'cache_coverage', versionKey: false })
export class CacheCoverage {
  @Prop({ type: String, required: true })
  _id!: string; // instrumentId

  @Prop({
    type: [{ _id: false, from: String, to: String }],
    default: [],
  })
  ranges!: { from: string; to: string }[];

  @Prop({ type: Date, default: () => new Date() })
  updatedAt!: Date;
}

export type CacheCoverageDocument = HydratedDocument<CacheCoverage>;
export const CacheCoverageSchema = SchemaFactory.createForClass(CacheCoverage);
