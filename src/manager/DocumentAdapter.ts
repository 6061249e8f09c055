/**
 * DocumentAdapter - Interface of the spreadsheet-automation collaborator.
 *
 * A document holds named queries. The manager reads them out for
 * extraction and writes resolved scripts back in dependency order.
 */

/**
 * One query as held by a document.
 */
export interface DocumentScript {
  name: string;
  body: string;
  description: string;
}

/**
 * Per-query outcome of a write.
 */
export interface DocumentWriteResult {
  name: string;
  ok: boolean;
  error?: string;
}

export interface DocumentAdapter {
  /**
   * Read every query from the document.
   */
  readScripts(documentRef: string): Promise<DocumentScript[]>;

  /**
   * Write queries into the document in the given order, replacing queries
   * of the same name.
   */
  writeScripts(documentRef: string, scripts: readonly DocumentScript[]): Promise<DocumentWriteResult[]>;
}
