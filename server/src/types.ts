export type Speaker = "user" | "tutor";

export type Turn = {
  speaker: Speaker;
  text: string;
  createdAt: string;
};

export type DocumentKind = "image" | "pdf";

export type UploadedDocument = {
  mimeType: string;
  bytes: Buffer;
  fileName?: string;
};

export type PageMimeType = "image/png" | "image/jpeg";

export type PageImage = {
  index: number;
  width: number;
  height: number;
  mimeType: PageMimeType;
  data: Buffer;
};

export type PagePreview = {
  width: number;
  height: number;
  dataUrl: string;
};

export type UploadSummary = {
  pageCount: number;
  caption: string;
  preview: PagePreview | null;
};
