export type { KindSource } from "../../../shared/src/contracts";
export type { IssueInput, IssueParseResult, IssueReference, IssueRequest } from "./parse";
export { detectPackageKind, parseIssueReference, parseIssueRequest } from "./parse";
