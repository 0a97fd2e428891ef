/**
 * Storage port.
 *
 * Keyed persistence for whole documents. The memory snapshot is one such
 * document; implementations decide where it lives.
 */
export interface Storage {
  /**
   * Load a document by key.
   * @returns The parsed document, or null if the key does not exist
   * @throws When the document exists but cannot be read or parsed
   */
  load(key: string): Promise<unknown>;

  /**
   * Replace the document stored under a key.
   */
  save(key: string, data: unknown): Promise<void>;

  exists(key: string): Promise<boolean>;
}
