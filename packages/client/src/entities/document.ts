import { z } from "zod";
import { DEFAULT_BASE_URL } from "../client/config.js";
import type { JsonObject } from "../client/els-client.js";
import { parseResponsePart } from "../utils/parse.js";
import { Entity } from "./entity.js";
import { PAYLOAD_KEYS } from "./payload.js";

const documentFieldsSchema = z.object({
  coredata: z.object({
    "dc:title": z.string(),
  }),
});

export class Document extends Entity {
  protected override readonly payloadKey = PAYLOAD_KEYS.document;
  title?: string;

  static fromScopusId(
    scopusId: string,
    baseUrl: string = DEFAULT_BASE_URL
  ): Document {
    const path = `content/abstract/scopus_id/${encodeURIComponent(scopusId)}`;
    return new Document(new URL(path, baseUrl).toString());
  }

  protected override applyFields(data: JsonObject, url: string): void {
    const fields = parseResponsePart(documentFieldsSchema, data, {
      path: this.payloadKey,
      url,
    });
    this.title = fields.coredata["dc:title"];
  }
}
