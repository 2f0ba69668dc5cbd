/**
 * Escrow vault and token/lamport movements.
 *
 * Token accounts are stored in the SPL token account layout. Vaults are
 * token accounts at ["escrow_vault", config, mint] owned by the config's
 * pda authority; only the program moves funds out of them.
 */

import {
  ACCOUNT_SIZE,
  AccountLayout,
  AccountState,
  NATIVE_MINT,
  type RawAccount,
} from "@solana/spl-token";
import { PublicKey } from "@solana/web3.js";
import type { AccountStore } from "./account_store.js";
import { ensure, fail } from "../errors.js";
import { isTokenProgram } from "../solana.js";
import { checkedAdd, checkedSub } from "../utils/math.js";

export function readTokenAccount(store: AccountStore, address: PublicKey, label: string): RawAccount {
  const account = store.getRequired(address, label);
  ensure(isTokenProgram(account.owner), "InvalidTokenAccountOwner", `${label}:${account.owner.toBase58()}`);
  ensure(account.data.length >= ACCOUNT_SIZE, "InvalidTokenAccount", label);

  const raw = AccountLayout.decode(account.data);
  ensure(raw.state !== AccountState.Uninitialized, "UninitializedTokenAccount", label);
  return raw;
}

/**
 * Balance of a token account, or 0 when it does not exist or is not a token account.
 */
export function tokenBalanceOrZero(store: AccountStore, address: PublicKey): bigint {
  const account = store.get(address);
  if (!account || !isTokenProgram(account.owner) || account.data.length < ACCOUNT_SIZE) return 0n;
  return AccountLayout.decode(account.data).amount;
}

function writeTokenAccount(store: AccountStore, address: PublicKey, raw: RawAccount): void {
  const data = Buffer.alloc(ACCOUNT_SIZE);
  AccountLayout.encode(raw, data);
  store.setData(address, data);
}

export type TokenAccountExpectation = {
  mint: PublicKey;
  authority: PublicKey;
};

export function ensureTokenAccount(raw: RawAccount, expected: TokenAccountExpectation, label: string): void {
  ensure(raw.mint.equals(expected.mint), "InvalidTokenMint", `${label}:${raw.mint.toBase58()}`);
  ensure(raw.owner.equals(expected.authority), "InvalidTokenAuthority", `${label}:${raw.owner.toBase58()}`);
}

export type CreateTokenAccountParams = {
  address: PublicKey;
  mint: PublicKey;
  authority: PublicKey;
  tokenProgram: PublicKey;
};

export function createTokenAccount(store: AccountStore, p: CreateTokenAccountParams): void {
  ensure(isTokenProgram(p.tokenProgram), "InvalidAccount", `token_program:${p.tokenProgram.toBase58()}`);
  store.allocate(p.address, p.tokenProgram, ACCOUNT_SIZE);

  const native = p.mint.equals(NATIVE_MINT);
  writeTokenAccount(store, p.address, {
    mint: p.mint,
    owner: p.authority,
    amount: native ? store.lamports(p.address) : 0n,
    delegateOption: 0,
    delegate: PublicKey.default,
    state: AccountState.Initialized,
    isNativeOption: native ? 1 : 0,
    isNative: 0n,
    delegatedAmount: 0n,
    closeAuthorityOption: 0,
    closeAuthority: PublicKey.default,
  });
}

export type TransferTokensParams = {
  source: PublicKey;
  destination: PublicKey;
  authority: PublicKey;
  amount: bigint;
  mint?: PublicKey;
};

/**
 * Token transfer with authority, mint and balance checks. Native (WSOL)
 * accounts move the backing lamports along with the amount.
 */
export function transferTokens(store: AccountStore, p: TransferTokensParams): void {
  const source = readTokenAccount(store, p.source, "source");
  const destination = readTokenAccount(store, p.destination, "destination");

  ensure(source.owner.equals(p.authority), "InvalidTokenAuthority", `source_owner:${source.owner.toBase58()}`);
  ensure(source.mint.equals(destination.mint), "InvalidTokenMint", "source_destination_mint_mismatch");
  if (p.mint) ensure(source.mint.equals(p.mint), "InvalidTokenMint", `expected:${p.mint.toBase58()}`);
  ensure(source.amount >= p.amount, "InsufficientFunds", `balance:${source.amount} amount:${p.amount}`);

  if (p.amount === 0n || p.source.equals(p.destination)) return;

  writeTokenAccount(store, p.source, { ...source, amount: checkedSub(source.amount, p.amount) });
  writeTokenAccount(store, p.destination, { ...destination, amount: checkedAdd(destination.amount, p.amount) });

  if (source.isNativeOption === 1) {
    store.debit(p.source, p.amount);
    store.credit(p.destination, p.amount);
  }
}

/**
 * Close a token account; its lamports go to `destination`.
 */
export function closeTokenAccount(store: AccountStore, address: PublicKey, destination: PublicKey, authority: PublicKey): bigint {
  const raw = readTokenAccount(store, address, "close");
  ensure(raw.owner.equals(authority), "InvalidTokenAuthority", `close_owner:${raw.owner.toBase58()}`);
  ensure(raw.isNativeOption === 1 || raw.amount === 0n, "InvalidTokenAccount", `non_empty:${raw.amount}`);
  return store.close(address, destination);
}

export function transferLamports(store: AccountStore, from: PublicKey, to: PublicKey, amount: bigint): void {
  if (amount === 0n) return;
  store.debit(from, amount);
  store.credit(to, amount);
}

// vault

export type VaultParams = {
  vault: PublicKey;
  mint: PublicKey;
  pdaAuthority: PublicKey;
  tokenProgram: PublicKey;
};

export function initializeVault(store: AccountStore, p: VaultParams): void {
  if (store.get(p.vault)?.data.length) fail("AccountAlreadyInitialized", `vault:${p.vault.toBase58()}`);
  createTokenAccount(store, { address: p.vault, mint: p.mint, authority: p.pdaAuthority, tokenProgram: p.tokenProgram });
}

export function depositToVault(
  store: AccountStore,
  p: { from: PublicKey; vault: PublicKey; owner: PublicKey; mint: PublicKey; amount: bigint },
): void {
  transferTokens(store, { source: p.from, destination: p.vault, authority: p.owner, amount: p.amount, mint: p.mint });
}

export function releaseFromVault(
  store: AccountStore,
  p: { vault: PublicKey; to: PublicKey; pdaAuthority: PublicKey; mint: PublicKey; amount: bigint },
): void {
  transferTokens(store, { source: p.vault, destination: p.to, authority: p.pdaAuthority, amount: p.amount, mint: p.mint });
}
