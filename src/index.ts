import 'dotenv/config';
import { createServer } from './http/server.js';
import { config } from './config/index.js';
import { getDb, pool, closeDb } from './db/index.js';
import { runMigrations } from './db/migrate.js';
import { DrizzleChatStore } from './db/chat-store.js';
import { createServices } from './services/container.js';
import { BOTS } from './shared/bots.js';

async function main() {
  // 1. Init database
  const d = getDb();
  const applied = await runMigrations(pool());
  console.log(`Database connected (${applied.length} migration files applied)`);

  // 2. Wire services
  const store = new DrizzleChatStore(d);
  const services = createServices(store, config);

  // 3. Presence does not survive a restart
  await services.presence.markAllOffline();

  // 4. Reserved bot accounts
  if (config.SEED_BOTS) {
    await store.upsertBotUsers(
      BOTS.map((b) => ({ id: b.id, email: b.email, username: b.username, displayName: b.displayName })),
    );
  }

  // 5. Start HTTP server
  const server = createServer(services, config);
  server.listen(config.PORT, () => {
    console.log(`Chat server listening on port ${config.PORT}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`${signal} received, shutting down`);
    await services.presence.shutdown();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await services.tasks.drain();
    await closeDb();
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        console.error('Shutdown failed:', err);
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
