import { importSPKI, jwtVerify } from "jose";
import { DEFAULT_IDENT_URL } from "../config/env";
import { FetchFn } from "../capture/pageCapture";
import { PipelineError, errorMessage } from "../errors";

export interface CommitOptions {
  apiKey: string;
  identUrl?: string;
  fetchFn?: FetchFn;
}

export interface CommitResult {
  status: number;
}

function identEndpoint(identUrl: string, pathname: string): string {
  return `${identUrl.replace(/\/+$/, "")}/${pathname}`;
}

async function readOk(response: Response, label: string): Promise<string> {
  const text = await response.text();
  if (!response.ok) {
    throw new PipelineError(
      `${label} failed (${response.status} ${response.statusText}): ${text || "empty response"}`,
      response.status
    );
  }
  return text.trim();
}

export async function requestJwt(apiKey: string, identUrl: string, fetchFn: FetchFn): Promise<string> {
  const response = await fetchFn(identEndpoint(identUrl, "jwt"), {
    method: "POST",
    headers: { access_token: apiKey }
  });
  return readOk(response, "JWT request");
}

export async function fetchPublicKey(identUrl: string, fetchFn: FetchFn): Promise<string> {
  const response = await fetchFn(identEndpoint(identUrl, "publickey"));
  return readOk(response, "Public key request");
}

export async function verifyJwt(token: string, publicKeyPem: string): Promise<void> {
  try {
    const key = await importSPKI(publicKeyPem, "RS256");
    await jwtVerify(token, key, { algorithms: ["RS256"] });
  } catch (error) {
    console.error("Could not verify Data Together signature on JWT");
    throw new PipelineError(`JWT verification failed: ${errorMessage(error)}`, null, { cause: error });
  }
}

/**
 * Announces a finished scrape to the Data Together ident service. The JWT
 * issued for the API key is checked against the service's public key before
 * it is presented back.
 */
export async function commitRun(options: CommitOptions): Promise<CommitResult> {
  const identUrl = options.identUrl ?? DEFAULT_IDENT_URL;
  const fetchFn = options.fetchFn ?? fetch;

  const token = await requestJwt(options.apiKey, identUrl, fetchFn);
  const publicKey = await fetchPublicKey(identUrl, fetchFn);
  await verifyJwt(token, publicKey);

  const response = await fetchFn(identEndpoint(identUrl, "session"), {
    headers: { Authorization: `Bearer ${token}` }
  });
  await readOk(response, "Session request");
  console.log(`server responded with ${response.status}`);
  return { status: response.status };
}
