/**
 * HTTP gateway to the remote quota service.
 *
 * Invariants:
 * - Never throws; transport errors, timeouts and malformed bodies come back as `Err`.
 * - `fetchAccount` resolves `Ok(null)` when the service reports the account missing.
 */
import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import type { AccountId } from "@/db/types";
import { ApiEnvelopeSchema, RemoteAccountSchema, type RemoteAccount } from "./types";

export const REMOTE_TIMEOUT_MS = 10_000;

export interface RemoteAccountGateway {
  fetchAccount(id: AccountId): Promise<Result<RemoteAccount | null>>;
  /** Full overwrite of the record. Resolves whether the service accepted it. */
  replaceAccount(record: RemoteAccount): Promise<Result<boolean>>;
}

export type RemoteGatewayOptions = {
  baseUrl: string;
  accessToken: string;
  adminUserId: string;
  timeoutMs?: number;
  /** Custom transport; defaults to axios' Node http adapter. */
  adapter?: AxiosAdapter;
};

export function remoteOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): RemoteGatewayOptions {
  const baseUrl = env.API_BASE_URL;
  const accessToken = env.API_ACCESS_TOKEN;
  if (!baseUrl || !accessToken) {
    throw new Error("Remote API not configured (API_BASE_URL, API_ACCESS_TOKEN).");
  }
  return { baseUrl, accessToken, adminUserId: env.API_ADMIN_USER_ID ?? "1" };
}

class HttpRemoteAccountGateway implements RemoteAccountGateway {
  private http: AxiosInstance | null = null;

  constructor(private readonly resolveOptions: () => RemoteGatewayOptions) {}

  private client(): AxiosInstance {
    if (this.http) return this.http;
    const options = this.resolveOptions();
    this.http = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ""),
      timeout: options.timeoutMs ?? REMOTE_TIMEOUT_MS,
      adapter: options.adapter,
      headers: {
        Authorization: options.accessToken,
        "New-Api-User": options.adminUserId,
        "Content-Type": "application/json",
      },
    });
    return this.http;
  }

  async fetchAccount(id: AccountId): Promise<Result<RemoteAccount | null>> {
    try {
      const response = await this.client().get<unknown>(`/api/user/${id}`);
      const envelope = ApiEnvelopeSchema.safeParse(response.data);
      if (!envelope.success) {
        return ErrResult(new Error(`Unexpected response shape for account ${id}`));
      }
      if (!envelope.data.success || envelope.data.data == null) return OkResult(null);

      const account = RemoteAccountSchema.safeParse(envelope.data.data);
      if (!account.success) {
        console.warn("[RemoteAccounts] account record failed validation", {
          id,
          issues: account.error.issues,
        });
        return ErrResult(new Error(`Invalid account record for ${id}`));
      }
      return OkResult(account.data);
    } catch (error) {
      console.error("[RemoteAccounts] fetch failed:", { id, error: toError(error).message });
      return ErrResult(toError(error));
    }
  }

  async replaceAccount(record: RemoteAccount): Promise<Result<boolean>> {
    try {
      const response = await this.client().put<unknown>("/api/user/", record);
      const envelope = ApiEnvelopeSchema.safeParse(response.data);
      if (!envelope.success) {
        return ErrResult(new Error(`Unexpected response shape updating account ${record.id}`));
      }
      if (!envelope.data.success) {
        console.warn("[RemoteAccounts] update rejected", {
          id: record.id,
          message: envelope.data.message,
        });
      }
      return OkResult(envelope.data.success);
    } catch (error) {
      console.error("[RemoteAccounts] update failed:", {
        id: record.id,
        error: toError(error).message,
      });
      return ErrResult(toError(error));
    }
  }
}

export function createRemoteAccountGateway(
  options: RemoteGatewayOptions | (() => RemoteGatewayOptions),
): RemoteAccountGateway {
  return new HttpRemoteAccountGateway(
    typeof options === "function" ? options : () => options,
  );
}

/** Reads its endpoint and credentials from the environment on first use. */
export const remoteAccountGateway: RemoteAccountGateway = createRemoteAccountGateway(() =>
  remoteOptionsFromEnv(),
);

