// Shared Drive -- Example
//
// Demonstrates two workers sharing files through one drive:
//   1. Producer publishes a checkpoint directory under its component name
//   2. Consumer lists the drive
//   3. Consumer fetches the checkpoint (waiting for it if needed)
//   4. The drive handle is passed to a third worker as JSON and rebuilt
//   5. Producer cleans up its namespace
//
// Usage:
//   tsx examples/worker.ts
//
// Environment variables:
//   DRIVE_CONFIG_PATH  (optional) -- Config file (default: config/config.json, falls back to defaults)
//   DRIVE_ID           (optional) -- Drive identifier (default: lit://example)
//   DRIVE_STORAGE_URL  (optional) -- Use the HTTP storage server at this URL instead of the local filesystem
//   DRIVE_DATA_DIR     (optional) -- Local storage directory when no storage URL is set

import { mkdir, mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { loadConfig } from '../src/config/index.js';
import { Drive, WORK_CONTEXT, createDriveSession, maybeCreateDrive } from '../src/drive/index.js';

// ---------------------------------------------------------------------------
// Configuration from environment
// ---------------------------------------------------------------------------

const DRIVE_ID = process.env.DRIVE_ID ?? 'lit://example';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function log(step: string, message: string): void {
  console.log(`\n[${'='.repeat(60)}]`);
  console.log(`[STEP] ${step}`);
  console.log(`       ${message}`);
  console.log(`[${'='.repeat(60)}]`);
}

function logDetail(label: string, value: string): void {
  console.log(`  ${label}: ${value}`);
}

// ---------------------------------------------------------------------------
// Main flow
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const config = loadConfig({ optional: true });
  const session = createDriveSession(config, { context: WORK_CONTEXT });
  const workdir = await mkdtemp(join(tmpdir(), 'shared-drive-example-'));

  console.log('\n  Shared Drive -- Example');
  console.log('  =======================\n');
  console.log(`  Drive: ${DRIVE_ID}`);
  console.log(`  Storage: ${config.storage.backend === 'http' ? config.storage.http.baseUrl : config.storage.fs.dataDir}`);
  console.log(`  Workdir: ${workdir}`);

  const producerRoot = join(workdir, 'producer');
  const consumerRoot = join(workdir, 'consumer');
  const receiverRoot = join(workdir, 'receiver');
  await Promise.all([producerRoot, consumerRoot, receiverRoot].map((dir) => mkdir(dir, { recursive: true })));

  const producer = new Drive(DRIVE_ID, { ...session, componentName: 'producer', rootFolder: producerRoot });
  const consumer = new Drive(DRIVE_ID, { ...session, componentName: 'consumer', rootFolder: consumerRoot });

  // ---- Step 1: Publish ----
  log('1/5', 'Producer publishes checkpoint/ (put)');

  await mkdir(join(producerRoot, 'checkpoint'), { recursive: true });
  await writeFile(join(producerRoot, 'checkpoint', 'weights.txt'), `epoch 3 at ${new Date().toISOString()}`);
  await writeFile(join(producerRoot, 'checkpoint', 'meta.json'), JSON.stringify({ epoch: 3 }));
  await producer.put('checkpoint');

  logDetail('Published by', 'producer');

  // ---- Step 2: List ----
  log('2/5', 'Consumer lists the drive (list)');

  logDetail('Root', JSON.stringify(await consumer.list()));
  logDetail('checkpoint/', JSON.stringify(await consumer.list('checkpoint')));

  // ---- Step 3: Fetch ----
  log('3/5', 'Consumer fetches checkpoint/ (get, waits up to 10 seconds)');

  await consumer.get('checkpoint', { timeout: 10, overwrite: true });
  logDetail('weights.txt', await readFile(join(consumerRoot, 'checkpoint', 'weights.txt'), 'utf-8'));

  // ---- Step 4: Hand the drive to another worker ----
  log('4/5', 'Passing the drive handle to another worker as JSON');

  const wire = JSON.stringify({ drive: producer, note: 'state of a finished step' });
  logDetail('Serialized', wire);
  const state: unknown = JSON.parse(wire);
  const received =
    typeof state === 'object' && state !== null && 'drive' in state
      ? maybeCreateDrive('receiver', state.drive, { ...session, rootFolder: receiverRoot })
      : undefined;
  if (!(received instanceof Drive)) {
    console.error('\nThe received state did not contain a drive.');
    process.exit(1);
  }
  await received.get('checkpoint/meta.json', { componentName: 'producer' });
  logDetail('Receiver component', String(received.componentName));
  logDetail('meta.json', await readFile(join(receiverRoot, 'checkpoint', 'meta.json'), 'utf-8'));

  // ---- Step 5: Clean up ----
  log('5/5', 'Producer deletes its checkpoint (delete)');

  await producer.delete('checkpoint');
  logDetail('Remaining entries', JSON.stringify(await consumer.list()));

  console.log('\n  Done.\n');
}

main().catch((err: unknown) => {
  console.error('\nExample failed:', err);
  process.exit(1);
});
