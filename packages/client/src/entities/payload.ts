import { z } from "zod";
import {
  jsonObjectSchema,
  type ElsClient,
  type JsonObject,
} from "../client/els-client.js";
import { InvalidUriError } from "../utils/errors.js";
import { parseResponsePart } from "../utils/parse.js";

export const PAYLOAD_KEYS = {
  author: "author-retrieval-response",
  affiliation: "affiliation-retrieval-response",
  document: "abstracts-retrieval-response",
} as const;

export type PayloadKey = (typeof PAYLOAD_KEYS)[keyof typeof PAYLOAD_KEYS];

// The API serializes some records bare and some wrapped in a one-element list
const payloadSchema = z.union([
  jsonObjectSchema,
  z.array(jsonObjectSchema).nonempty(),
]);

const identifierSchema = z.object({
  coredata: z.object({
    "dc:identifier": z.string(),
  }),
});

const documentsSchema = z.object({
  documents: z.object({
    "@total": z.coerce.number().int().nonnegative(),
    "abstract-document": z
      .union([z.array(jsonObjectSchema), jsonObjectSchema])
      .optional(),
  }),
});

export interface EntityPayload {
  data: JsonObject;
  id: string;
}

export interface DocumentsPage {
  total: number;
  documents: JsonObject[];
}

export function normalizePayload(
  response: JsonObject,
  payloadKey: PayloadKey,
  url?: string
): JsonObject {
  const payload = parseResponsePart(payloadSchema, response[payloadKey], {
    path: payloadKey,
    url,
  });
  return Array.isArray(payload) ? payload[0] : payload;
}

export async function fetchPayload(
  client: ElsClient,
  uri: string,
  payloadKey: PayloadKey
): Promise<JsonObject> {
  const response = await client.execRequest(uri);
  return normalizePayload(response, payloadKey, client.resolveUrl(uri));
}

export async function readEntityPayload(
  client: ElsClient,
  uri: string,
  payloadKey: PayloadKey
): Promise<EntityPayload> {
  const data = await fetchPayload(client, uri, payloadKey);
  const { coredata } = parseResponsePart(identifierSchema, data, {
    path: payloadKey,
    url: client.resolveUrl(uri),
  });
  return { data, id: coredata["dc:identifier"] };
}

export function documentsUri(uri: string, start?: number): string {
  let url: URL;
  try {
    url = new URL(uri);
  } catch (error) {
    throw new InvalidUriError({ uri, cause: error });
  }
  url.searchParams.set("view", "documents");
  if (start !== undefined) {
    url.searchParams.set("start", String(start));
  }
  return url.toString();
}

export async function fetchDocumentsPage(
  client: ElsClient,
  uri: string,
  payloadKey: PayloadKey
): Promise<DocumentsPage> {
  const data = await fetchPayload(client, uri, payloadKey);
  const { documents } = parseResponsePart(documentsSchema, data, {
    path: payloadKey,
    url: uri,
  });
  const listed = documents["abstract-document"];
  return {
    total: documents["@total"],
    documents:
      listed === undefined ? [] : Array.isArray(listed) ? listed : [listed],
  };
}

/**
 * Fetches every document linked to a profile. The first page reports the
 * total; `floor(total / pageSize)` further pages follow, each starting at
 * `(page * pageSize) + 1`. Any failing page rejects the whole call.
 */
export async function readDocumentList(
  client: ElsClient,
  uri: string,
  payloadKey: PayloadKey
): Promise<JsonObject[]> {
  const base = client.resolveUrl(uri);
  const first = await fetchDocumentsPage(
    client,
    documentsUri(base),
    payloadKey
  );
  const docs = [...first.documents];

  const extraPages = Math.floor(first.total / client.pageSize);
  for (let i = 0; i < extraPages; i++) {
    const start = (i + 1) * client.pageSize + 1;
    const page = await fetchDocumentsPage(
      client,
      documentsUri(base, start),
      payloadKey
    );
    docs.push(...page.documents);
  }

  return docs;
}
