import type { ExportedFile } from "@/features/watershed";

/** Hands a generated file to the browser's download flow. */
export const saveExportedFile = (file: ExportedFile<Uint8Array | string>): void => {
  // slice() hands Blob a copy backed by a plain ArrayBuffer.
  const part = typeof file.data === "string" ? file.data : file.data.slice();
  const blob = new Blob([part], { type: file.mimeType });
  const url = URL.createObjectURL(blob);
  const anchor = document.createElement("a");
  anchor.href = url;
  anchor.download = file.filename;
  anchor.rel = "noopener";
  document.body.appendChild(anchor);
  anchor.click();
  anchor.remove();
  window.setTimeout(() => URL.revokeObjectURL(url), 0);
};
