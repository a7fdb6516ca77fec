export * from "./core/types.js";
export * from "./core/errors.js";
export * from "./core/commitment.js";
export * from "./core/config.js";
export { auditTransaction, compareBundles, decideVerdict, resolveFee, type AuditOptions, type FeeInfo } from "./core/auditor.js";
export { countVerdicts, prepareHashes, runAudit, runBatch, type BatchOptions } from "./core/batch.js";
export { openSessions, sessionIdentity, type ProviderSession, type SessionOptions } from "./core/session.js";
export * from "./rpc/provider.js";
export * from "./rpc/retry.js";
export { classifyRpcError, EvmProviderAdapter, type EvmProviderOptions } from "./rpc/evmProvider.js";
export { buildJsonReport, renderJson, resultToJson, type JsonReport, type JsonResult } from "./report/json.js";
export { formatBatchHuman, formatTransactionDetail, iconSet, EMOJI_ICONS, PLAIN_ICONS, type IconSet } from "./report/human.js";
export { networkName, NETWORKS } from "./report/networks.js";
export { normalizeTxHash, validateTxHash, isValidTxHash } from "./utils/validate.js";
