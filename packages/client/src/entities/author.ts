import { z } from "zod";
import { DEFAULT_BASE_URL } from "../client/config.js";
import type { JsonObject } from "../client/els-client.js";
import { parseResponsePart } from "../utils/parse.js";
import { Profile } from "./entity.js";
import { PAYLOAD_KEYS } from "./payload.js";

const authorFieldsSchema = z.object({
  "author-profile": z.object({
    "preferred-name": z.object({
      // Mononymous authors come back without a given name
      "given-name": z.string().nullish(),
      surname: z.string(),
    }),
  }),
});

/** An author profile in Scopus. */
export class Author extends Profile {
  protected override readonly payloadKey = PAYLOAD_KEYS.author;
  firstName = "";
  lastName = "";
  fullName?: string;

  static fromId(authorId: string, baseUrl: string = DEFAULT_BASE_URL): Author {
    const path = `content/author/author_id/${encodeURIComponent(authorId)}`;
    return new Author(new URL(path, baseUrl).toString());
  }

  protected override applyFields(data: JsonObject, url: string): void {
    const fields = parseResponsePart(authorFieldsSchema, data, {
      path: this.payloadKey,
      url,
    });
    const name = fields["author-profile"]["preferred-name"];
    this.firstName = name["given-name"] ?? "";
    this.lastName = name.surname;
    this.fullName = `${this.firstName} ${this.lastName}`.trim();
  }
}
