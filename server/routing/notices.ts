import type { ResponseNotice } from "@shared/responseNotices";
import { NOTICE_CODES } from "@shared/responseNotices";
import type { QueryStatus, ResponseMode } from "./types";

export function docsGroundedNotice(sourceCount: number): ResponseNotice {
  return {
    kind: "grounding",
    code: NOTICE_CODES.DOCS_GROUNDED,
    label: "Your documents",
    message: `Based on ${sourceCount} document${sourceCount === 1 ? "" : "s"} in this conversation.`,
    severity: "info",
  };
}

export function webGroundedNotice(sourceCount: number): ResponseNotice {
  return {
    kind: "grounding",
    code: NOTICE_CODES.WEB_GROUNDED,
    label: "Web sources",
    message: `Your documents did not fully cover this question, so ${sourceCount} web page${sourceCount === 1 ? " was" : "s were"} consulted.`,
    severity: "info",
  };
}

export function ungroundedNotice(): ResponseNotice {
  return {
    kind: "disclaimer",
    code: NOTICE_CODES.UNGROUNDED,
    label: "General knowledge",
    message: "This answer is not based on your documents or on web sources. Verify important details independently.",
    severity: "warning",
  };
}

export function noEvidenceNotice(): ResponseNotice {
  return {
    kind: "grounding",
    code: NOTICE_CODES.NO_EVIDENCE,
    label: "No evidence",
    message: "Nothing relevant was found in the documents for this conversation.",
    severity: "warning",
  };
}

export function webUnavailableNotice(): ResponseNotice {
  return {
    kind: "system",
    code: NOTICE_CODES.WEB_UNAVAILABLE,
    label: "Web search unavailable",
    message: "Web search returned nothing usable for this question.",
    severity: "warning",
  };
}

export function processingErrorNotice(): ResponseNotice {
  return {
    kind: "error",
    code: NOTICE_CODES.PROCESSING_ERROR,
    label: "Error",
    message: "An error occurred while generating the answer. Please try again.",
    severity: "error",
  };
}

export interface NoticeInput {
  mode: ResponseMode;
  status: QueryStatus;
  citedCount: number;
  webAttemptFailed: boolean;
}

export function buildNotices({ mode, status, citedCount, webAttemptFailed }: NoticeInput): ResponseNotice[] {
  if (status === "failed") {
    return [processingErrorNotice()];
  }

  const notices: ResponseNotice[] = [];

  switch (mode) {
    case "grounded_in_docs":
      notices.push(docsGroundedNotice(citedCount));
      break;
    case "grounded_in_web":
      notices.push(webGroundedNotice(citedCount));
      break;
    case "internal_llm_weights":
      if (webAttemptFailed) notices.push(webUnavailableNotice());
      notices.push(ungroundedNotice());
      break;
    case "no_evidence_found":
      notices.push(noEvidenceNotice());
      break;
  }

  return notices;
}
