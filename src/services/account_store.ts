import { PublicKey, SystemProgram } from "@solana/web3.js";
import { ensure, fail } from "../errors.js";
import { checkedAdd } from "../utils/math.js";

export type StoredAccount = {
  owner: PublicKey;
  lamports: bigint;
  data: Buffer;
};

export type AccountStoreSnapshot = ReadonlyMap<string, StoredAccount>;

const copy = (a: StoredAccount): StoredAccount => ({ owner: a.owner, lamports: a.lamports, data: Buffer.from(a.data) });

/**
 * In-process ledger: address -> (owner program, lamports, data).
 * Entries are replaced on write, never mutated in place.
 */
export class AccountStore {
  private accounts = new Map<string, StoredAccount>();

  get(address: PublicKey): StoredAccount | null {
    return this.accounts.get(address.toBase58()) ?? null;
  }

  getRequired(address: PublicKey, label: string): StoredAccount {
    const account = this.get(address);
    if (!account) fail("InvalidAccount", `missing:${label}:${address.toBase58()}`);
    return account;
  }

  exists(address: PublicKey): boolean {
    return this.accounts.has(address.toBase58());
  }

  set(address: PublicKey, account: StoredAccount): void {
    this.accounts.set(address.toBase58(), copy(account));
  }

  setData(address: PublicKey, data: Buffer): void {
    const account = this.getRequired(address, "set_data");
    this.accounts.set(address.toBase58(), { ...account, data: Buffer.from(data) });
  }

  lamports(address: PublicKey): bigint {
    return this.get(address)?.lamports ?? 0n;
  }

  /**
   * Adds lamports, creating a system-owned account on first credit.
   */
  credit(address: PublicKey, amount: bigint): void {
    const account = this.get(address) ?? { owner: SystemProgram.programId, lamports: 0n, data: Buffer.alloc(0) };
    this.accounts.set(address.toBase58(), { ...account, lamports: checkedAdd(account.lamports, amount) });
  }

  debit(address: PublicKey, amount: bigint): void {
    const account = this.getRequired(address, "debit");
    ensure(account.lamports >= amount, "InsufficientFunds", `lamports:${account.lamports} debit:${amount}`);
    this.accounts.set(address.toBase58(), { ...account, lamports: account.lamports - amount });
  }

  /**
   * Allocate zeroed data owned by `owner`. Lamports already sitting on the
   * address (e.g. a pre-funded PDA) are kept.
   */
  allocate(address: PublicKey, owner: PublicKey, space: number): void {
    const existing = this.get(address);
    ensure(
      !existing || (existing.data.length === 0 && existing.owner.equals(SystemProgram.programId)),
      "AccountAlreadyInitialized",
      address.toBase58(),
    );
    this.accounts.set(address.toBase58(), { owner, lamports: existing?.lamports ?? 0n, data: Buffer.alloc(space) });
  }

  /**
   * Remove an account, sweeping its lamports to `destination`.
   */
  close(address: PublicKey, destination: PublicKey): bigint {
    const account = this.getRequired(address, "close");
    this.accounts.delete(address.toBase58());
    if (account.lamports > 0n) this.credit(destination, account.lamports);
    return account.lamports;
  }

  addresses(): PublicKey[] {
    return [...this.accounts.keys()].map((k) => new PublicKey(k));
  }

  snapshot(): AccountStoreSnapshot {
    return new Map([...this.accounts].map(([k, v]) => [k, copy(v)]));
  }

  restore(snapshot: AccountStoreSnapshot): void {
    this.accounts = new Map([...snapshot].map(([k, v]) => [k, copy(v)]));
  }
}
