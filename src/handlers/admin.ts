import { SystemProgram } from "@solana/web3.js";
import { ensure } from "../errors.js";
import { NoArgsZ, UpdateGlobalConfigArgsZ } from "../schemas/instructions.js";
import { emptyGlobalConfig, GLOBAL_CONFIG_SIZE } from "../state/global_config.js";
import { initializeVault, transferLamports } from "../services/escrow_vault.js";
import {
  ensureEmergencyModeDisabled,
  initializeGlobalConfig,
  updateGlobalConfig,
  updateGlobalConfigAdmin,
} from "../services/global_config.js";
import { syncAuthorityBalance, withdrawHostTip } from "../services/tip_ledger.js";
import { derivePdaAuthority, deriveEscrowVault } from "../utils/pda.js";
import { isTokenProgram } from "../solana.js";
import {
  defineHandler,
  ensureKey,
  ensureZeroedAccount,
  loadGlobalConfig,
  requiredKey,
  resolveAccounts,
  saveGlobalConfig,
} from "./context.js";

export const initializeGlobalConfigHandler = defineHandler(NoArgsZ, (ctx) => {
  const a = resolveAccounts(ctx, "initialize_global_config");
  const admin = requiredKey(a, "admin_authority");
  const globalConfigKey = requiredKey(a, "global_config");
  const pdaAuthority = requiredKey(a, "pda_authority");
  ensureKey(requiredKey(a, "system_program"), SystemProgram.programId, "system_program");

  const [expectedAuthority, bump] = derivePdaAuthority(ctx.programId, globalConfigKey);
  ensure(pdaAuthority.equals(expectedAuthority), "InvalidPdaAuthority", pdaAuthority.toBase58());
  ensureZeroedAccount(ctx, globalConfigKey, GLOBAL_CONFIG_SIZE, "global_config");

  const config = emptyGlobalConfig();
  initializeGlobalConfig(config, {
    adminAuthority: admin,
    pdaAuthority,
    pdaAuthorityBump: bump,
    pdaAuthorityLamports: ctx.store.lamports(pdaAuthority),
  });
  saveGlobalConfig(ctx, globalConfigKey, config);

  ctx.log.info({ globalConfig: globalConfigKey.toBase58(), admin: admin.toBase58() }, "global_config_initialized");
});

export const initializeVaultHandler = defineHandler(NoArgsZ, (ctx) => {
  const a = resolveAccounts(ctx, "initialize_vault");
  const admin = requiredKey(a, "admin_authority");
  const globalConfigKey = requiredKey(a, "global_config");
  const pdaAuthority = requiredKey(a, "pda_authority");
  const mint = requiredKey(a, "mint");
  const vault = requiredKey(a, "vault");
  const tokenProgram = requiredKey(a, "token_program");

  const config = loadGlobalConfig(ctx, globalConfigKey);
  ensureEmergencyModeDisabled(config);
  ensure(config.adminAuthority.equals(admin), "InvalidAdminAuthority");
  ensure(config.pdaAuthority.equals(pdaAuthority), "InvalidPdaAuthority");
  ensure(isTokenProgram(tokenProgram), "InvalidAccount", `token_program:${tokenProgram.toBase58()}`);

  const [expectedVault] = deriveEscrowVault(ctx.programId, globalConfigKey, mint);
  ensureKey(vault, expectedVault, "vault");

  initializeVault(ctx.store, { vault, mint, pdaAuthority, tokenProgram });
  ctx.log.info({ vault: vault.toBase58(), mint: mint.toBase58() }, "vault_initialized");
});

export const updateGlobalConfigHandler = defineHandler(UpdateGlobalConfigArgsZ, (ctx, args) => {
  const a = resolveAccounts(ctx, "update_global_config");
  const admin = requiredKey(a, "admin_authority");
  const globalConfigKey = requiredKey(a, "global_config");

  const config = loadGlobalConfig(ctx, globalConfigKey);
  ensure(config.adminAuthority.equals(admin), "InvalidAdminAuthority");

  updateGlobalConfig(config, args.mode, args.value);
  saveGlobalConfig(ctx, globalConfigKey, config);

  ctx.log.info({ mode: args.mode }, "global_config_updated");
});

export const updateGlobalConfigAdminHandler = defineHandler(NoArgsZ, (ctx) => {
  const a = resolveAccounts(ctx, "update_global_config_admin");
  const cached = requiredKey(a, "admin_authority_cached");
  const globalConfigKey = requiredKey(a, "global_config");

  const config = loadGlobalConfig(ctx, globalConfigKey);
  updateGlobalConfigAdmin(config, cached);
  saveGlobalConfig(ctx, globalConfigKey, config);

  ctx.log.info({ admin: cached.toBase58() }, "global_config_admin_rotated");
});

export const withdrawHostTipHandler = defineHandler(NoArgsZ, (ctx) => {
  const a = resolveAccounts(ctx, "withdraw_host_tip");
  const admin = requiredKey(a, "admin_authority");
  const globalConfigKey = requiredKey(a, "global_config");
  const pdaAuthority = requiredKey(a, "pda_authority");
  ensureKey(requiredKey(a, "system_program"), SystemProgram.programId, "system_program");

  const config = loadGlobalConfig(ctx, globalConfigKey);
  ensureEmergencyModeDisabled(config);
  ensure(config.adminAuthority.equals(admin), "InvalidAdminAuthority");
  ensure(config.pdaAuthority.equals(pdaAuthority), "InvalidPdaAuthority");

  const amount = withdrawHostTip(config, ctx.store.lamports(pdaAuthority));
  transferLamports(ctx.store, pdaAuthority, admin, amount);
  syncAuthorityBalance(config, ctx.store.lamports(pdaAuthority));
  saveGlobalConfig(ctx, globalConfigKey, config);

  ctx.log.info({ amount: amount.toString() }, "host_tip_withdrawn");
});
