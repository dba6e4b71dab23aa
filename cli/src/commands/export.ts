import { Command } from 'commander';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import chalk from 'chalk';
import { getApiClient, exportFileName, formatSize, handleError } from '../utils';

interface ExportOptions {
  dir: string;
}

export const exportCommand = new Command('export')
  .description('Download every document of a transaction')
  .argument('<transaction-id>', 'Transaction to export')
  .option('-d, --dir <path>', 'Target directory', '.')
  .action(async (transactionId: string, options: ExportOptions) => {
    try {
      const client = getApiClient();
      const documents = await client.listDocumentsWithContent(transactionId);

      if (documents.length === 0) {
        console.log(chalk.yellow('No documents found.'));
        return;
      }

      mkdirSync(options.dir, { recursive: true });
      for (const { record, content } of documents) {
        const target = join(options.dir, exportFileName(record));
        writeFileSync(target, content);
        console.log(`${chalk.green('✓')} ${target} (${formatSize(content.length)})`);
      }

      console.log(`\nExported ${documents.length} documents`);
    } catch (error) {
      handleError(error, 'Export');
    }
  });
