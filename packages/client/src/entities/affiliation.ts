import { z } from "zod";
import { DEFAULT_BASE_URL } from "../client/config.js";
import type { JsonObject } from "../client/els-client.js";
import { parseResponsePart } from "../utils/parse.js";
import { Profile } from "./entity.js";
import { PAYLOAD_KEYS } from "./payload.js";

const affiliationFieldsSchema = z.object({
  "affiliation-name": z.string(),
});

/** An institution an author is affiliated with. */
export class Affiliation extends Profile {
  protected override readonly payloadKey = PAYLOAD_KEYS.affiliation;
  name?: string;

  static fromId(
    affiliationId: string,
    baseUrl: string = DEFAULT_BASE_URL
  ): Affiliation {
    const id = encodeURIComponent(affiliationId);
    const path = `content/affiliation/affiliation_id/${id}`;
    return new Affiliation(new URL(path, baseUrl).toString());
  }

  protected override applyFields(data: JsonObject, url: string): void {
    const fields = parseResponsePart(affiliationFieldsSchema, data, {
      path: this.payloadKey,
      url,
    });
    this.name = fields["affiliation-name"];
  }
}
