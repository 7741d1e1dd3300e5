/**
 * SDK Telemetry
 *
 * Runtime and SDK metadata attached to every ingestion batch.
 * Follows OpenTelemetry semantic conventions.
 */

import type { SDKTelemetry, ServiceConfig } from './types';

export const SDK_NAME = '@tracebatch/sdk';
export const SDK_VERSION = '0.1.0';
const SDK_LANGUAGE = 'nodejs';

// ─────────────────────────────────────────────────────────────
// Runtime Detection
// ─────────────────────────────────────────────────────────────

function detectOS(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'darwin':
      return 'darwin';
    case 'win32':
      return 'windows';
    case 'linux':
      return 'linux';
    default:
      return platform;
  }
}

// ─────────────────────────────────────────────────────────────
// Telemetry Builder
// ─────────────────────────────────────────────────────────────

let cachedTelemetry: SDKTelemetry | null = null;

/**
 * Build SDK telemetry object with auto-detected values
 */
export function buildTelemetry(service?: ServiceConfig): SDKTelemetry {
  if (!cachedTelemetry) {
    cachedTelemetry = {
      'telemetry.sdk.name': SDK_NAME,
      'telemetry.sdk.version': SDK_VERSION,
      'telemetry.sdk.language': SDK_LANGUAGE,
      'process.runtime.name': 'nodejs',
      'process.runtime.version': process.versions.node,
      'os.type': detectOS(process.platform),
    };
  }

  // Merge with service config
  const telemetry: SDKTelemetry = { ...cachedTelemetry };

  if (service?.name) {
    telemetry['service.name'] = service.name;
  }
  if (service?.version) {
    telemetry['service.version'] = service.version;
  }
  if (service?.environment) {
    telemetry['deployment.environment'] = service.environment;
  }

  return telemetry;
}

/**
 * Reset cached telemetry (for testing)
 */
export function resetTelemetryCache(): void {
  cachedTelemetry = null;
}
