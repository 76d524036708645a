import { exampleStatus } from "../store/examples";
import type { ExampleRecord, MediaUrls } from "../contracts";

/** One line per record: id, state, title, and the error when failed. */
export function formatRecordLine(record: ExampleRecord): string {
  const status = exampleStatus(record);
  const state = record.approved ? `${status}, approved` : status;
  const line = `${record.id}  [${state}]  ${record.title}`;
  return record.processing_error ? `${line}  (${record.processing_error})` : line;
}

export function formatRecordDetail(record: ExampleRecord, urls: MediaUrls): string {
  const lines = [
    `ID:          ${record.id}`,
    `Title:       ${record.title}`,
    `Status:      ${exampleStatus(record)}${record.approved ? " (approved)" : ""}`,
    `File name:   ${record.original_filename}`,
    `Uploaded by: ${record.uploaded_by ?? "-"}`,
    `Created:     ${record.created_at}`,
  ];
  if (record.description) lines.push(`Description: ${record.description}`);
  if (record.processing_error) lines.push(`Error:       ${record.processing_error}`);
  if (record.pending_file) lines.push(`Pending:     ${record.pending_file}`);
  if (record.file) lines.push(`File:        ${record.file.backend}:${record.file.key}`);
  if (record.thumb) lines.push(`Thumbnail:   ${record.thumb.backend}:${record.thumb.key}`);
  if (record.duration !== undefined) lines.push(`Duration:    ${record.duration.toFixed(1)}s`);
  if (record.processed_at) lines.push(`Processed:   ${record.processed_at}`);
  if (record.approved_at) lines.push(`Approved:    ${record.approved_at}`);
  if (urls.fileUrl) lines.push(`File URL:    ${urls.fileUrl}`);
  if (urls.thumbUrl) lines.push(`Thumb URL:   ${urls.thumbUrl}`);
  return lines.join("\n");
}
