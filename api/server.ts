/**
 * Entry point - runs one emulation session with its telemetry API until
 * SIGINT/SIGTERM
 */

import 'dotenv/config';
import { loadEmulatorConfig } from '../common/config';
import { EmulationOrchestrator } from '../modules/orchestrator';
import { TelemetryClient } from './client';

/**
 * Poll our own status endpoint once, the way pool software would
 */
export async function selfCheck(orchestrator: EmulationOrchestrator): Promise<boolean> {
  const baseUrl = orchestrator.apiAddress();
  if (!baseUrl) {
    console.log('   Telemetry API: not reachable (simulation-only mode)');
    return false;
  }

  const client = new TelemetryClient(baseUrl);
  const result = await client.getMinerStatus();
  if (!result.success || !result.data) {
    console.warn(`⚠️  Self-check failed: ${result.error ?? `HTTP ${result.status}`}`);
    return false;
  }

  const [summary] = result.data.SUMMARY;
  console.log(
    `   Self-check: ${result.data.DEVS.length} boards, ${summary['MHS av']} MH/s, ${summary.Temperature}°C`
  );
  return true;
}

export async function main(): Promise<EmulationOrchestrator> {
  const config = loadEmulatorConfig();
  const orchestrator = new EmulationOrchestrator(config);

  await orchestrator.initialize();

  const status = orchestrator.status();
  console.log(`🚀 ASIC emulator running (session ${status.session_id})`);
  console.log(`   Model: ${status.device_model}`);
  console.log(`   Domain: ${status.current_domain}`);
  console.log(`   Native control: ${status.native_vendor ?? 'none (simulation)'}`);
  await selfCheck(orchestrator);

  const stop = (signal: NodeJS.Signals) => {
    console.log(`Received ${signal}, shutting down`);
    orchestrator
      .shutdown()
      .then(() => process.exit(0))
      .catch(error => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  return orchestrator;
}

if (require.main === module) {
  main().catch(error => {
    console.error('Failed to start emulator:', error);
    process.exit(1);
  });
}
