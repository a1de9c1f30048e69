import type { SchemaIntrospector } from './types.js';
import { describeFromInformationSchema } from './utils.js';

export const postgresIntrospector: SchemaIntrospector = {
  describeTable: describeFromInformationSchema
};
