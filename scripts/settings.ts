#!/usr/bin/env npx tsx
/**
 * Settings CLI
 *
 * Usage:
 *   npx tsx scripts/settings.ts show                  # Show rule set and search suffix
 *   npx tsx scripts/settings.ts add-keyword <k>       # Add a chain keyword
 *   npx tsx scripts/settings.ts remove-keyword <k>    # Remove a chain keyword
 *   npx tsx scripts/settings.ts add-domain <d>        # Add an affiliate domain
 *   npx tsx scripts/settings.ts remove-domain <d>     # Remove an affiliate domain
 *   npx tsx scripts/settings.ts set-suffix <s>        # Change the search suffix
 *   npx tsx scripts/settings.ts test-sheets           # Check the Google Sheets connection
 */

import { assertSheetsConfigured, getConfig } from '@/lib/config';
import { errorMessage } from '@/lib/errors';
import { FileSettingsStore } from '@/lib/settings';
import { createSheetsClient } from '@/lib/sheets/sheets-client';
import type { SettingsSnapshot } from '@/types';

function showHelp() {
  console.log(`
Settings CLI

Commands:
  show                  Show the exclusion rule set and search suffix
  add-keyword <k>       Add a chain keyword
  remove-keyword <k>    Remove a chain keyword
  add-domain <d>        Add an affiliate domain
  remove-domain <d>     Remove an affiliate domain
  set-suffix <s>        Change the search suffix
  test-sheets           Check the Google Sheets connection
  help                  Show this help
`);
}

function printSettings(settings: SettingsSnapshot) {
  const { ruleSet } = settings;
  console.log(`\n⚙️  Search suffix: ${settings.searchSuffix}`);
  console.log(`   Exclude sponsored: ${ruleSet.excludeSponsored ? 'yes' : 'no'}`);
  console.log(`\n   Chain keywords (${ruleSet.chainKeywords.length}):`);
  ruleSet.chainKeywords.forEach((keyword) => console.log(`   - ${keyword}`));
  console.log(`\n   Affiliate domains (${ruleSet.affiliateDomains.length}):`);
  ruleSet.affiliateDomains.forEach((domain) => console.log(`   - ${domain}`));
  console.log('');
}

function requireValue(command: string, value: string | undefined): string {
  if (!value?.trim()) {
    throw new Error(`"${command}" needs a value`);
  }
  return value;
}

async function testSheets(): Promise<boolean> {
  const config = getConfig();
  assertSheetsConfigured(config);

  const status = await createSheetsClient(config.sheets).testConnection(config.sheets.spreadsheetId);
  if (status.ok) {
    console.log(`✅ Connected to "${status.spreadsheetTitle ?? config.sheets.spreadsheetId}"`);
    console.log(`   Worksheet: ${status.sheetName} (${status.rowCount ?? 0} rows)`);
  } else {
    console.log(`❌ Connection failed: ${status.error}`);
  }
  return status.ok;
}

async function main(): Promise<number> {
  const command = process.argv[2]?.toLowerCase() || 'help';
  const value = process.argv[3];
  const store = new FileSettingsStore(getConfig().settingsPath);

  switch (command) {
    case 'show':
      printSettings(await store.getSnapshot());
      return 0;
    case 'add-keyword':
      printSettings(await store.addChainKeyword(requireValue(command, value)));
      return 0;
    case 'remove-keyword':
      printSettings(await store.removeChainKeyword(requireValue(command, value)));
      return 0;
    case 'add-domain':
      printSettings(await store.addAffiliateDomain(requireValue(command, value)));
      return 0;
    case 'remove-domain':
      printSettings(await store.removeAffiliateDomain(requireValue(command, value)));
      return 0;
    case 'set-suffix':
      printSettings(await store.setSearchSuffix(requireValue(command, value)));
      return 0;
    case 'test-sheets':
      return (await testSheets()) ? 0 : 1;
    case 'help':
      showHelp();
      return 0;
    default:
      console.log(`Unknown command: ${command}`);
      showHelp();
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error('❌', errorMessage(error));
    process.exit(1);
  });
