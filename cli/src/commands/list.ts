import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { getApiClient, handleError } from '../utils';

export const listCommand = new Command('list')
  .description('List the documents of a transaction')
  .argument('<transaction-id>', 'Transaction to list')
  .action(async (transactionId: string) => {
    try {
      const client = getApiClient();
      const documents = await client.listDocuments(transactionId);

      if (documents.length === 0) {
        console.log(chalk.yellow('No documents found.'));
        return;
      }

      const table = new Table({
        head: ['ID', 'NAME', 'CATEGORY', 'TYPE', 'FORMAT'],
        colWidths: [38, 30, 12, 12, 10]
      });

      documents.forEach(doc => {
        table.push([doc.docId, doc.docName, doc.docCatCode, doc.docTypCode, doc.docFileFormat]);
      });

      console.log(table.toString());
      console.log(`\nTotal: ${documents.length} documents`);
    } catch (error) {
      handleError(error, 'List');
    }
  });
