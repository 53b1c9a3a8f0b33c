/**
 * Prints the known journals and a summary of the active one.
 * Run with: npm run inspect
 * Set JOURNAL_PASSWORD to inspect an encrypted journal.
 */
import 'dotenv/config';
import { config, manifestPath } from '../src/config/index.js';
import { JournalSession } from '../src/core/journal/JournalSession.js';
import { entryPreview } from '../src/model/journal.js';
import { formatFileSize } from '../src/utils/files.js';
import { JournalRegistry } from '../src/registry/JournalRegistry.js';

function main(): void {
  const path = manifestPath(config);
  if (!JournalRegistry.exists(path)) {
    console.log(`No journal manifest at ${path}`);
    return;
  }

  const registry = JournalRegistry.load(path);
  if (registry.migrateLegacyFormat()) {
    console.log('(manifest uses the legacy single-journal layout)');
  }

  console.log('Journals (most recent first):');
  for (const journal of registry.sortedByRecency()) {
    const marker = journal.path === registry.activePath ? '*' : ' ';
    const opened = journal.lastOpened ? journal.lastOpened.toISOString() : 'never';
    const lock = journal.encrypted ? ' [encrypted]' : '';
    console.log(` ${marker} ${journal.name}${lock}  ${journal.path}  (last opened: ${opened})`);
  }

  const active = registry.active();
  if (!active) {
    return;
  }
  const password = process.env.JOURNAL_PASSWORD;
  if (active.encrypted && !password) {
    console.log('\nActive journal is encrypted; set JOURNAL_PASSWORD to inspect it.');
    return;
  }

  const session = JournalSession.open(active, { password });
  const versions = session.entries.reduce((sum, entry) => sum + entry.history.length, 0);
  const attachments = session.entries.flatMap((entry) => entry.attachments);
  const bytes = attachments.reduce((sum, attachment) => sum + attachment.size, 0);

  console.log(`\n${active.name}:`);
  console.log(`  Entries:        ${session.entries.length}`);
  console.log(`  Saved versions: ${versions}`);
  console.log(`  Attachments:    ${attachments.length} (${formatFileSize(bytes)})`);
  const latest = session.entries[0];
  if (latest) {
    console.log(`  Latest entry:   ${latest.date}  ${entryPreview(latest, 40)}`);
  }
}

main();
