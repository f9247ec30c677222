import { Config } from '../../config';
import { ByteFormatter } from '../../utils/ByteFormatter';

/**
 * Lines logged once the listener is up
 */
export function describeStartup(config: Config, version: string, logFile: string | null): string[] {
  return [
    `--- Announce proxy v${version} ---`,
    `Listening on ${config.LISTEN_HOST}:${config.LISTEN_PORT}`,
    `Max Upload Multiplier: ${ByteFormatter.toMultiplier(config.MAX_UPLOAD_MULTIPLIER)}`,
    `Seeding Multiplier: ${ByteFormatter.toMultiplier(config.SEEDING_MULTIPLIER)}`,
    `Ramp-up Time: ${config.RAMP_UP_SECONDS} seconds`,
    `Global Ratio Limit: ${config.GLOBAL_RATIO_LIMIT} (cooldown ${config.COOLDOWN_DURATION_MINUTES} min)`,
    config.UPDATE_CHECK_URL
      ? `Update check: ${config.UPDATE_CHECK_URL}`
      : 'Update check: off (set UPDATE_CHECK_URL to enable)',
    `Logs: ${logFile ?? 'console only'}`,
  ];
}
