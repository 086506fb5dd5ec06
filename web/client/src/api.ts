export interface FolderScanner {
  /** Lists every file path inside `directory`, unfiltered and in any order. */
  scan(directory: string): Promise<string[]>;
}

interface FolderListing {
  directory: string;
  entries: string[];
}

async function fetchJson(url: string): Promise<unknown> {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`Request failed (${response.status})`);
  }
  return response.json();
}

function isFolderListing(value: unknown): value is FolderListing {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  if (!("directory" in value) || !("entries" in value)) {
    return false;
  }
  return (
    typeof value.directory === "string" &&
    Array.isArray(value.entries) &&
    value.entries.every((entry: unknown) => typeof entry === "string")
  );
}

export function folderUrl(apiBase: string, directory: string): string {
  return `${apiBase}/api/folders?path=${encodeURIComponent(directory)}`;
}

export function fileUrl(apiBase: string, path: string): string {
  return `${apiBase}/api/files?path=${encodeURIComponent(path)}`;
}

export function createHttpFolderScanner(apiBase: string): FolderScanner {
  return {
    async scan(directory) {
      const body = await fetchJson(folderUrl(apiBase, directory));
      if (!isFolderListing(body)) {
        throw new Error(`Malformed folder listing for ${directory}`);
      }
      return body.entries;
    },
  };
}

export async function fetchFile(apiBase: string, path: string, signal: AbortSignal): Promise<Response> {
  const response = await fetch(fileUrl(apiBase, path), { signal });
  if (!response.ok) {
    throw new Error(`Request failed (${response.status})`);
  }
  return response;
}
