import { Command } from 'commander';
import { writeFileSync } from 'fs';
import chalk from 'chalk';
import { getApiClient, formatSize, handleError } from '../utils';

interface GetOptions {
  output?: string;
}

export const getCommand = new Command('get')
  .description('Download the content of a document')
  .argument('<transaction-id>', 'Transaction the document belongs to')
  .argument('<document-id>', 'Document ID to download')
  .option('-o, --output <path>', 'Where to write the content (defaults to the document ID)')
  .action(async (transactionId: string, documentId: string, options: GetOptions) => {
    try {
      const client = getApiClient();
      const content = await client.getDocumentContent(transactionId, documentId);
      const outputPath = options.output || documentId;

      writeFileSync(outputPath, content);
      console.log(chalk.green(`✓ Saved ${formatSize(content.length)} to ${outputPath}`));
    } catch (error) {
      handleError(error, 'Get');
    }
  });
