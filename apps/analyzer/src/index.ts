import { config } from 'dotenv';
import path from 'path';
import fs from 'fs';

// Load .env.local if it exists (takes precedence over .env, but not shell)
const envLocalPath = path.join(process.cwd(), '.env.local');
if (fs.existsSync(envLocalPath)) {
  config({ path: envLocalPath });
}

// Load .env (defaults)
config();

import { formatAppConfigForLog, loadAppConfig } from './config.js';
import { APIServer } from './modules/app/app.js';
import { GeoIPService } from './modules/geo/geo.service.js';

let apiServer: APIServer | undefined;
let geoService: GeoIPService | undefined;
let shuttingDown = false;

async function main() {
  console.log('[Main] Starting analyzer service...');

  const appConfig = loadAppConfig();
  console.info(`[Main] Config: ${formatAppConfigForLog(appConfig)}`);

  // Initialize GeoIP service
  geoService = await GeoIPService.open(appConfig.geoipDatabasePath);

  // Initialize API server
  console.log('[Main] Starting API server on port', appConfig.port);
  apiServer = new APIServer({
    port: appConfig.port,
    host: appConfig.host,
    geoService,
    geoipMaxLookups: appConfig.geoipMaxLookups,
    maxUploadBytes: appConfig.maxUploadBytes,
    logger: appConfig.logger,
  });
  await apiServer.start();

  // Handle graceful shutdown
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

// Graceful shutdown
async function shutdown() {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log('[Main] Shutting down...');

  let exitCode = 0;
  try {
    await apiServer?.stop();
  } catch (error) {
    console.error('[Main] Server forced to shutdown:', error);
    exitCode = 1;
  }
  geoService?.close();

  console.log('[Main] Shutdown complete');
  process.exit(exitCode);
}

main().catch((error: unknown) => {
  console.error('[Main] Failed to start:', error);
  process.exit(1);
});
