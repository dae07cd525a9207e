type GetFileResponse = {
  ok?: boolean;
  result?: { file_path?: string; file_size?: number };
  description?: string;
};

function isGetFileResponse(x: unknown): x is GetFileResponse {
  return typeof x === "object" && x !== null;
}

export async function telegramGetFile(botToken: string, fileId: string): Promise<{ file_path: string }> {
  const res = await fetch(`https://api.telegram.org/bot${botToken}/getFile?file_id=${encodeURIComponent(fileId)}`);
  const json: unknown = await res.json();
  if (!isGetFileResponse(json) || !json.ok || !json.result?.file_path) {
    throw new Error(`getFile failed: ${JSON.stringify(json)}`);
  }
  return { file_path: json.result.file_path };
}

export async function telegramDownloadFile(botToken: string, filePath: string): Promise<Uint8Array> {
  const url = `https://api.telegram.org/file/bot${botToken}/${filePath}`;
  const res = await fetch(url);
  if (!res.ok) throw new Error(`download failed: ${res.status} ${res.statusText}`);
  return new Uint8Array(await res.arrayBuffer());
}

export async function telegramDownloadFileById(botToken: string, fileId: string): Promise<Uint8Array> {
  const file = await telegramGetFile(botToken, fileId);
  return await telegramDownloadFile(botToken, file.file_path);
}
