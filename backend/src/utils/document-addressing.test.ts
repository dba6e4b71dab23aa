import { buildObjectKey, deriveDocumentId, deriveFileFormat, DOCUMENT_ID_NAMESPACE } from './document-addressing';

describe('Document addressing', () => {
  describe('deriveDocumentId', () => {
    it('should derive the name-based UUID of transaction + category in the OID namespace', () => {
      expect(DOCUMENT_ID_NAMESPACE).toBe('6ba7b812-9dad-11d1-80b4-00c04fd430c8');
      expect(deriveDocumentId('txn-123', 'POA')).toBe('2e520fd6-ac40-548d-b56f-336eb2b6fdea');
      expect(deriveDocumentId('txn-123', 'POI')).toBe('083f5218-20fc-5d37-99c8-4d4e5ed0f159');
      expect(deriveDocumentId('txn-456', 'POA')).toBe('e21dd0e1-46b0-5889-adda-3b2c102f7124');
    });

    it('should return the same identifier for the same pair', () => {
      const pairs: Array<[string, string]> = [
        ['txn-123', 'POA'],
        ['txn-123', 'POI'],
        ['10001100770000120220915120000', 'POR'],
        ['a', ''],
      ];

      for (const [transactionId, category] of pairs) {
        expect(deriveDocumentId(transactionId, category)).toBe(deriveDocumentId(transactionId, category));
      }
    });

    it('should return different identifiers for different categories of one transaction', () => {
      const categories = ['POA', 'POI', 'POR', 'POB', 'POE'];
      const ids = categories.map((category) => deriveDocumentId('txn-123', category));

      expect(new Set(ids).size).toBe(categories.length);
    });

    it('should produce version 5 UUIDs', () => {
      expect(deriveDocumentId('txn-789', 'POI')).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
      );
    });

    it('should hash the plain concatenation of both values', () => {
      // No separator: ("txn-1", "23POA") names the same document as ("txn-123", "POA")
      expect(deriveDocumentId('txn-1', '23POA')).toBe(deriveDocumentId('txn-123', 'POA'));
    });
  });

  describe('buildObjectKey', () => {
    it('should join transaction and document id with a single slash', () => {
      expect(buildObjectKey('txn-123', '2e520fd6-ac40-548d-b56f-336eb2b6fdea'))
        .toBe('txn-123/2e520fd6-ac40-548d-b56f-336eb2b6fdea');
    });

    it('should not normalise either part', () => {
      expect(buildObjectKey(' txn ', 'Doc.ID')).toBe(' txn /Doc.ID');
    });
  });

  describe('deriveFileFormat', () => {
    it('should return the extension of a simple filename', () => {
      expect(deriveFileFormat('passport.pdf')).toBe('pdf');
    });

    it('should use the text after the last dot for multi-dot names', () => {
      expect(deriveFileFormat('scan.final.png')).toBe('png');
      expect(deriveFileFormat('archive.tar.gz')).toBe('gz');
    });

    it('should keep the extension case', () => {
      expect(deriveFileFormat('Photo.JPEG')).toBe('JPEG');
    });

    it('should return null when there is no base name or extension', () => {
      expect(deriveFileFormat('passport')).toBeNull();
      expect(deriveFileFormat('.env')).toBeNull();
      expect(deriveFileFormat('scan.')).toBeNull();
      expect(deriveFileFormat('')).toBeNull();
    });
  });
});
