export type NoticeKind = "grounding" | "disclaimer" | "system" | "error";

export type NoticeSeverity = "info" | "warning" | "error";

export interface ResponseNotice {
  kind: NoticeKind;
  code: string;
  label: string;
  message: string;
  severity?: NoticeSeverity;
}

export const NOTICE_CODES = {
  DOCS_GROUNDED: "DOCS_GROUNDED",
  WEB_GROUNDED: "WEB_GROUNDED",
  UNGROUNDED: "UNGROUNDED",
  NO_EVIDENCE: "NO_EVIDENCE",
  WEB_UNAVAILABLE: "WEB_UNAVAILABLE",
  PROCESSING_ERROR: "PROCESSING_ERROR",
} as const;
