/* ── thrown errors ──────────────────────────────────────────
   Block admission never throws; these cover contract violations
   and bad configuration only. */

export class CodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CodecError";
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export class GenesisError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`invalid genesis: ${issues.join("; ")}`);
    this.name = "GenesisError";
  }
}

export class MiningAbortedError extends Error {
  constructor(readonly attempts: bigint) {
    super(`mining aborted after ${attempts} attempts`);
    this.name = "MiningAbortedError";
  }
}
