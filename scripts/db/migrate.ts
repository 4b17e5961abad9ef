import { closePool } from '../../src/db/db';
import { PgNewsStore } from '../../src/db/newsRepository';
import { config } from '../../src/config/env';

async function main() {
  const store = new PgNewsStore({ tsConfig: config.SEARCH_TS_CONFIG, archiveAfterDays: config.ARCHIVE_AFTER_DAYS });
  await store.init();
  // eslint-disable-next-line no-console
  console.log(`schema applied; full-text index ${store.fullTextIndex() ? 'available' : 'unavailable'}`);
}

main()
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error('migrate failed', err);
    process.exitCode = 1;
  })
  .finally(async () => {
    await closePool();
  });
