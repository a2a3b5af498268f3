import type { ElsClient, JsonObject } from "../client/els-client.js";
import { isReadError, type ReadResult } from "../utils/errors.js";
import {
  readDocumentList,
  readEntityPayload,
  type PayloadKey,
} from "./payload.js";

export interface Readable {
  readResult(client: ElsClient): Promise<ReadResult>;
  read(client: ElsClient): Promise<boolean>;
}

export interface DocumentListing {
  readDocsResult(client: ElsClient): Promise<ReadResult>;
  readDocs(client: ElsClient): Promise<boolean>;
}

/**
 * A record in the Scopus data model, addressed by its retrieval URI.
 * `data` and `id` stay undefined until the first successful read and are
 * replaced, never merged, by each later one.
 */
export abstract class Entity implements Readable {
  readonly uri: string;
  data?: JsonObject;
  id?: string;

  protected abstract readonly payloadKey: PayloadKey;

  constructor(uri: string) {
    this.uri = uri;
  }

  /**
   * Validates and assigns the subclass's own fields. Implementations must
   * finish validating before they assign anything.
   */
  protected abstract applyFields(data: JsonObject, url: string): void;

  getUri(): string {
    return this.uri;
  }

  async readResult(client: ElsClient): Promise<ReadResult> {
    try {
      const { data, id } = await readEntityPayload(
        client,
        this.uri,
        this.payloadKey
      );
      this.applyFields(data, client.resolveUrl(this.uri));
      this.data = data;
      this.id = id;
      return { ok: true };
    } catch (error) {
      if (!isReadError(error)) {
        throw error;
      }
      client.logger.debug(
        `[Entity] Read failed for ${this.uri}: ${error.message}`
      );
      return { ok: false, error };
    }
  }

  async read(client: ElsClient): Promise<boolean> {
    const result = await this.readResult(client);
    return result.ok;
  }
}

/**
 * An entity with a paginated list of linked documents (authors and
 * affiliations).
 */
export abstract class Profile extends Entity implements DocumentListing {
  docList?: JsonObject[];

  async readDocsResult(client: ElsClient): Promise<ReadResult> {
    try {
      const docs = await readDocumentList(client, this.uri, this.payloadKey);
      this.docList = docs;
      client.logger.debug(
        `[Entity] Read ${docs.length} documents for ${this.uri}`
      );
      return { ok: true };
    } catch (error) {
      if (!isReadError(error)) {
        throw error;
      }
      client.logger.debug(
        `[Entity] Document list failed for ${this.uri}: ${error.message}`
      );
      return { ok: false, error };
    }
  }

  async readDocs(client: ElsClient): Promise<boolean> {
    const result = await this.readDocsResult(client);
    return result.ok;
  }
}
