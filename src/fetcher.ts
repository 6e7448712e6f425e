import axios, { type AxiosRequestConfig } from "axios";
import type { FetchContent, FetchResult } from "./types.js";
import { errorMessage } from "./utils.js";

export interface FetcherOptions {
  timeoutMs?: number; // 0 disables the timeout
  userAgent?: string;
  adapter?: AxiosRequestConfig["adapter"];
}

export function createFetcher(options: FetcherOptions = {}): FetchContent {
  const client = axios.create({
    timeout: options.timeoutMs ?? 0,
    responseType: "text",
    headers: options.userAgent ? { "User-Agent": options.userAgent } : undefined,
    adapter: options.adapter,
  });

  return async function fetchContent(url: string): Promise<FetchResult> {
    try {
      const { data } = await client.get<unknown>(url);
      const content = typeof data === "string" ? data : "";
      if (!content) {
        console.error(`[FETCH] Empty response from ${url}`);
        return { ok: false, reason: "empty response" };
      }
      return { ok: true, content };
    } catch (err) {
      const reason = errorMessage(err);
      console.error(`[FETCH] Request error for ${url}:`, reason);
      return { ok: false, reason };
    }
  };
}
