// ============================================================================
// TechTransfer example — patents, software, spinoffs
// ============================================================================
// Usage: npm run example:techtransfer
// ============================================================================

import '../env.js';

import { TechTransferClient } from '../services/techtransfer.service.js';
import { runMain, truncate } from './cli.js';
import type { TechTransferRecord } from '../types/nasa.types.js';

function printRecords(records: TechTransferRecord[], noun: string): void {
    if (records.length === 0) {
        console.log(`No ${noun} found`);
        return;
    }
    console.log(`Found ${records.length} ${noun}:`);
    records.forEach((record, i) => {
        console.log(`\n  ${i + 1}. ${record.title}`);
        switch (record.kind) {
            case 'patent':
                if (record.patentNumber) console.log(`     Patent Number: ${record.patentNumber}`);
                break;
            case 'software':
                if (record.releaseType) console.log(`     Release: ${record.releaseType}`);
                break;
            case 'spinoff':
                if (record.company) console.log(`     Company: ${record.company}`);
                if (record.state) console.log(`     State: ${record.state}`);
                if (record.publicationYear) console.log(`     Year: ${record.publicationYear}`);
                break;
        }
        if (record.center) console.log(`     NASA Center: ${record.center}`);
        if (record.description) console.log(`     Description: ${truncate(record.description, 150)}`);
    });
}

runMain(async () => {
    console.log('🔬 NASA TechTransfer example\n');

    const client = new TechTransferClient();

    console.log('📜 Searching patents for "solar energy"...');
    printRecords((await client.searchPatents('solar energy', { limit: 3 })).results, 'patent(s)');
    console.log();

    console.log('💻 Searching software for "machine learning"...');
    printRecords((await client.searchSoftware('machine learning', { limit: 3 })).results, 'software item(s)');
    console.log();

    console.log('🏭 Searching spinoffs for "medical"...');
    printRecords((await client.searchSpinoffs('medical', { limit: 3 })).results, 'spinoff(s)');
    console.log();

    console.log('🔎 Searching all categories for "robotics"...');
    for (const entry of await client.searchAll('robotics', { limit: 2 })) {
        if ('error' in entry) {
            console.log(`Error in ${entry.category}: ${entry.error}`);
            continue;
        }
        console.log(`\n${entry.category.toUpperCase()}:`);
        for (const item of entry.result.results) console.log(`  • ${item.title}`);
    }
    console.log();

    console.log('📂 Available categories:');
    for (const category of client.getCategories()) console.log(`  • ${category}`);
    console.log();

    console.log('✅ All TechTransfer examples completed successfully!');
});
