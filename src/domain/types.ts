export const DOCUMENT_TYPES = [
  "EXTENSION",
  "CRAWLED_URL",
  "FILE",
  "SLACK_CONNECTOR",
  "NOTION_CONNECTOR",
  "YOUTUBE_VIDEO",
  "GITHUB_CONNECTOR",
] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export const CONNECTOR_TYPES = [
  "SERPER_API",
  "TAVILY_API",
  "SLACK_CONNECTOR",
  "NOTION_CONNECTOR",
  "GITHUB_CONNECTOR",
] as const;

export type ConnectorType = (typeof CONNECTOR_TYPES)[number];

export type DocumentMetadata = Record<string, unknown>;

export interface SearchSpaceRecord {
  id: number;
  ownerId: string;
  name: string;
  description: string | null;
  createdAt: string;
}

export interface DocumentRecord {
  id: number;
  searchSpaceId: number;
  title: string;
  documentType: DocumentType;
  metadata: DocumentMetadata;
  content: string;
  createdAt: string;
}

export interface DocumentRef {
  id: number;
  searchSpaceId: number;
  title: string;
  documentType: DocumentType;
}

export interface ChunkRecord {
  id: number;
  documentId: number;
  index: number;
  content: string;
  createdAt: string;
}

export interface ChunkSearchRecord extends ChunkRecord {
  document: DocumentRef;
}

export interface RankedEntity<T> {
  entity: T;
  score: number;
}

export interface FusedEntity<T> extends RankedEntity<T> {
  vectorRank: number | null;
  lexicalRank: number | null;
}

export function isDocumentType(value: string): value is DocumentType {
  return DOCUMENT_TYPES.some((type) => type === value);
}
