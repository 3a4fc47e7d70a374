import { ApiError } from "./errors.js";

export interface LevelView {
  symbol: string;
  targetPrice: number;
  createdAt: string;
}

export interface ListedLevelView extends LevelView {
  currentPrice: number | null;
  distancePercent: number | null;
  status: "hit" | "watching" | "unknown";
}

export interface AddLevelResponse {
  level: LevelView;
  isUpdate: boolean;
  previousPrice: number | null;
  currentPrice: number;
  distancePercent: number;
  warning: string | null;
}

/** Whole-string numeric parse; "12abc" is rejected rather than read as 12. */
export function parseTargetPrice(raw: string): number | null {
  const price = Number(raw);
  return raw.trim() && Number.isFinite(price) && price > 0 ? price : null;
}

/** Talks to a running alerts server on behalf of one user. */
export class AlertsClient {
  constructor(
    private readonly baseUrl: string,
    private readonly userId: string,
  ) {}

  add(symbol: string, targetPrice: number): Promise<AddLevelResponse> {
    return this.request("POST", "/levels", { symbol, targetPrice });
  }

  list(): Promise<ListedLevelView[]> {
    return this.request("GET", "/levels");
  }

  remove(symbol: string): Promise<LevelView> {
    return this.request("DELETE", `/levels/${encodeURIComponent(symbol)}`);
  }

  private async request<T>(method: string, path: string, body?: object): Promise<T> {
    const url = `${this.baseUrl}/api/users/${encodeURIComponent(this.userId)}${path}`;
    const res = await fetch(url, {
      method,
      headers: body ? { "Content-Type": "application/json" } : undefined,
      body: body ? JSON.stringify(body) : undefined,
    });
    const data = parseJson(await res.text());
    if (!res.ok) {
      const message =
        typeof data === "object" && data !== null && "error" in data && typeof data.error === "string"
          ? data.error
          : `Request failed with status ${res.status}`;
      throw new ApiError(res.status, message);
    }
    if (data === undefined) {
      throw new ApiError(res.status, "Server returned a non-JSON response");
    }
    return data as T;
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
