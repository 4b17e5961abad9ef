import { closePool } from '../../src/db/db';
import { PgNewsStore } from '../../src/db/newsRepository';
import { config } from '../../src/config/env';

async function main() {
  const store = new PgNewsStore({ tsConfig: config.SEARCH_TS_CONFIG, archiveAfterDays: config.ARCHIVE_AFTER_DAYS });
  await store.init();

  const rebuild = store.capabilities.indexRebuild;
  if (!rebuild) throw new Error('store does not support index rebuilds');

  const mode = await rebuild.rebuildIndex();
  // eslint-disable-next-line no-console
  console.log(`full-text index rebuilt (${mode})`);
}

main()
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error('rebuildIndex failed', err);
    process.exitCode = 1;
  })
  .finally(async () => {
    await closePool();
  });
