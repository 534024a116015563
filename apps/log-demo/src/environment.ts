import { SF } from '@gcp-structured-log/service-framework-node';
import { TB } from '@gcp-structured-log/service-framework-node/typebox';

export const logDemoEnvSchema = TB.Object({
  ...SF.DefaultEnvSchemaType.properties,
  PROCESS_NAME: TB.String({ minLength: 1, default: 'log-demo' }),
  LOG_SOURCE_LOCATION: TB.Boolean({ default: true }),
  PORT: TB.Integer({ default: 3000 }),

  // Operation the startup statements are grouped under
  DEMO_OPERATION_ID: TB.String({ minLength: 1, default: 'My Service' }),
});

export type LogDemoEnv = TB.Static<typeof logDemoEnvSchema>;
