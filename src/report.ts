import type { ParsingError } from "./errors";
import type { BatchError, ServiceError } from "./model";

export function formatParsingErrors(errors: readonly ParsingError[]): string[] {
  if (errors.length === 0) return ["Finished without parsing errors."];
  return [
    `There were ${errors.length} parsing error(s):`,
    ...errors.map(
      (e) =>
        `  Row ${e.rowNumber}, product: ${e.productId ?? ""} \tError: ${e.message}\n` +
        `      Complete product description: ${e.line}`,
    ),
  ];
}

export function formatServiceError(e: ServiceError): string {
  return `{${e.code ?? ""} ; ${e.location ?? ""} ; ${e.domain ?? ""} ; ${e.internalReason ?? ""}} `;
}

export function formatServiceErrors(errors: readonly BatchError[]): string[] {
  if (errors.length === 0) return ["Finished without service errors."];
  return [
    `There were ${errors.length} service error(s):`,
    ...errors.map((e) => {
      const details = e.serviceErrors?.length ? `[${e.serviceErrors.map(formatServiceError).join("")}]` : "";
      return `  Product: ${e.id ?? ""} \tCode: ${e.code} \tReason: ${e.reason ?? ""}${details}`;
    }),
  ];
}

export function printStatusReport(parsing: readonly ParsingError[], service: readonly BatchError[]) {
  console.log("== Status report ==");
  for (const line of formatParsingErrors(parsing)) console.log(line);
  for (const line of formatServiceErrors(service)) console.log(line);
}
