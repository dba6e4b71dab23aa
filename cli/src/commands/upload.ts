import { Command } from 'commander';
import { readFileSync } from 'fs';
import { basename } from 'path';
import chalk from 'chalk';
import { getApiClient, formatSize, handleError } from '../utils';

interface UploadOptions {
  category: string;
  type: string;
  lang: string;
  name?: string;
}

export const uploadCommand = new Command('upload')
  .description('Upload a document for a transaction')
  .argument('<transaction-id>', 'Transaction the document belongs to')
  .argument('<file>', 'Path of the file to upload')
  .requiredOption('-c, --category <code>', 'Document category code (one document per category)')
  .option('-t, --type <code>', 'Document type code', '')
  .option('-l, --lang <code>', 'Language code', 'eng')
  .option('-n, --name <name>', 'Filename to store instead of the local one')
  .action(async (transactionId: string, filePath: string, options: UploadOptions) => {
    try {
      const client = getApiClient();
      const fileName = options.name || basename(filePath);
      const content = readFileSync(filePath);

      console.log(chalk.blue(`Uploading ${fileName} (${formatSize(content.length)})...`));

      const document = await client.uploadDocument(transactionId, fileName, content, {
        docCatCode: options.category,
        docTypCode: options.type,
        langCode: options.lang,
      });

      console.log(chalk.green('✓ Upload complete'));
      console.log(`Document ID: ${chalk.yellow(document.docId)}`);
      console.log(`Filename: ${document.docName}`);
      console.log(`Category: ${document.docCatCode}`);
      console.log(`Format: ${document.docFileFormat}`);
    } catch (error) {
      handleError(error, 'Upload');
    }
  });
