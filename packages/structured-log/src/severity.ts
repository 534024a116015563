import { Type } from '@sinclair/typebox';

/**
 * Severity levels recognized by Cloud Logging.
 * https://cloud.google.com/logging/docs/reference/v2/rest/v2/LogEntry#LogSeverity
 */
export const CloudSeverity = {
  /** The log entry has no assigned severity level. */
  Default: 'Default',
  /** Debug or trace information. */
  Debug: 'Debug',
  /** Routine information, such as ongoing status or performance. */
  Info: 'Info',
  /** Normal but significant events, such as start up, shut down, or a configuration change. */
  Notice: 'Notice',
  /** Warning events might cause problems. */
  Warning: 'Warning',
  /** Error events are likely to cause problems. */
  Error: 'Error',
  /** Critical events cause more severe problems or outages. */
  Critical: 'Critical',
  /** A person must take an action immediately. */
  Alert: 'Alert',
  /** One or more systems are unusable. */
  Emergency: 'Emergency',
} as const;

export type CloudSeverity = (typeof CloudSeverity)[keyof typeof CloudSeverity];

export const cloudSeverityTokens = {
  Default: 'default',
  Debug: 'debug',
  Info: 'info',
  Notice: 'notice',
  Warning: 'warning',
  Error: 'error',
  Critical: 'critical',
  Alert: 'alert',
  Emergency: 'emergency',
} as const satisfies Record<CloudSeverity, string>;

export type CloudSeverityToken = (typeof cloudSeverityTokens)[CloudSeverity];

export const cloudSeverityValues: Record<CloudSeverity, number> = {
  Default: 0,
  Debug: 100,
  Info: 200,
  Notice: 300,
  Warning: 400,
  Error: 500,
  Critical: 600,
  Alert: 700,
  Emergency: 800,
};

export const CloudSeverityTokenSchema = Type.Union(
  Object.values(cloudSeverityTokens).map((token) => Type.Literal(token)),
);

const severitiesByToken = new Map<string, CloudSeverity>(
  Object.values(CloudSeverity).map((severity): [string, CloudSeverity] => [
    cloudSeverityTokens[severity],
    severity,
  ]),
);

export function toSeverityToken(severity: CloudSeverity): CloudSeverityToken {
  return cloudSeverityTokens[severity];
}

export function fromSeverityToken(token: string): CloudSeverity | undefined {
  return severitiesByToken.get(token);
}

export function compareSeverity(left: CloudSeverity, right: CloudSeverity): number {
  return cloudSeverityValues[left] - cloudSeverityValues[right];
}
