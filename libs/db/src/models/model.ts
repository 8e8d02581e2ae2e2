import {
  plugin,
  modelOptions,
  Severity,
  DocumentType,
} from '@typegoose/typegoose';
import paginate from 'mongoose-paginate-v2';

export type IBaseModel = DocumentType<BaseModel>;

@plugin(paginate)
@modelOptions({
  options: {
    allowMixed: Severity.ALLOW,
  },
  schemaOptions: {
    timestamps: true,
  },
})
export class BaseModel {}
