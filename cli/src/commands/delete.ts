import { Command } from 'commander';
import { getApiClient, formatDeletionStatus, handleError } from '../utils';

export const deleteCommand = new Command('delete')
  .description('Delete a document')
  .argument('<transaction-id>', 'Transaction the document belongs to')
  .argument('<document-id>', 'Document ID to delete')
  .action(async (transactionId: string, documentId: string) => {
    try {
      const client = getApiClient();
      const result = await client.deleteDocument(transactionId, documentId);
      console.log(`${formatDeletionStatus(result.status)} ${result.message}`);
      if (result.status === 'FAILURE') {
        process.exitCode = 1;
      }
    } catch (error) {
      handleError(error, 'Delete');
    }
  });
