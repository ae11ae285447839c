import { isRecord } from "./paginate.js";

export class MalformedIdentity extends Error {
  constructor(detail: string) {
    super(`Malformed identity: ${detail}`);
    this.name = "MalformedIdentity";
  }
}

export type AccountId = number | string | null;

/** base64 of {"identity":{"account_number": accountId}} */
export function encodeIdentity(accountId: AccountId): string {
  const identity = { identity: { account_number: accountId } };
  return Buffer.from(JSON.stringify(identity)).toString("base64");
}

/**
 * Read the account number out of an x-rh-identity blob. A well-formed
 * identity without an account number yields null.
 */
export function decodeIdentity(blob: string): AccountId {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(blob, "base64").toString("utf-8"));
  } catch {
    throw new MalformedIdentity("not base64 encoded JSON");
  }

  if (!isRecord(parsed)) throw new MalformedIdentity("not a JSON object");
  const identity = parsed.identity;
  if (identity === undefined) return null;
  if (!isRecord(identity)) throw new MalformedIdentity("'identity' is not an object");

  const account = identity.account_number;
  if (account === undefined || account === null) return null;
  if (typeof account !== "number" && typeof account !== "string") {
    throw new MalformedIdentity("'account_number' is not a string or number");
  }
  return account;
}
