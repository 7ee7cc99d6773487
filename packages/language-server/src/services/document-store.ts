import { TextDocument } from "vscode-languageserver-textdocument";
import type { TextDocumentContentChangeEvent, TextDocumentItem } from "vscode-languageserver/node.js";
import { URI } from "vscode-uri";

/**
 * Open documents, kept in sync with didOpen/didChange/didClose.
 *
 * The server applies content changes itself (rather than through
 * `TextDocuments`) because diagnostics have to be shifted with the raw change
 * events before the text moves on.
 */
export class DocumentStore {
  #documents = new Map<string, TextDocument>();

  open(item: TextDocumentItem): TextDocument {
    const doc = TextDocument.create(item.uri, item.languageId, item.version, item.text);
    this.#documents.set(item.uri, doc);
    return doc;
  }

  applyChanges(uri: string, changes: readonly TextDocumentContentChangeEvent[], version: number): TextDocument | undefined {
    const doc = this.#documents.get(uri);
    if (!doc) return undefined;
    const updated = TextDocument.update(doc, [...changes], version);
    this.#documents.set(uri, updated);
    return updated;
  }

  get(uri: string): TextDocument | undefined {
    return this.#documents.get(uri);
  }

  has(uri: string): boolean {
    return this.#documents.has(uri);
  }

  all(): TextDocument[] {
    return [...this.#documents.values()];
  }

  close(uri: string): boolean {
    return this.#documents.delete(uri);
  }
}

/** Filesystem path of a `file:` document, or null for anything else. */
export function documentPath(uri: string): string | null {
  const parsed = URI.parse(uri);
  if (parsed.scheme !== "file") return null;
  return parsed.fsPath;
}
