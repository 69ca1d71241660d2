import { randomUUID } from "node:crypto";
import type { FastifyBaseLogger } from "fastify";
import type {
  CostBreakdownItem,
  CostEstimate,
  CreditLedgerEntry,
  Job,
  SystemSetting,
  Task,
  User,
  UserAiProvider,
} from "@crewforge/types";
import { AppError, InsufficientCreditsError, NotFoundError, StoreError } from "../errors.js";
import type { Store } from "../store/types.js";
import { KeyedMutex } from "./keyedMutex.js";

export type CreditTier = "chat" | "project";

export interface CreditSettings {
  credits_per_1k_tokens_chat: number;
  credits_per_1k_tokens_project: number;
}

export const DEFAULT_CREDIT_SETTINGS: CreditSettings = {
  credits_per_1k_tokens_chat: 0.5,
  credits_per_1k_tokens_project: 1.0,
};

export interface LedgerReference {
  type: string;
  id: string;
}

export interface BalanceChange {
  success: true;
  /** Monto aplicado; 0 si el usuario esta exento. */
  charged: number;
  balance: number;
  entry: CreditLedgerEntry | null;
}

export interface JobCostEstimate extends CostEstimate {
  /** Copia de las tasks con estimated_credits calculado. */
  tasks: Task[];
}

export interface ContinuationCheck {
  can_continue: boolean;
  free_usage: boolean;
  credits_needed: number;
  user_credits: number;
  shortfall: number;
  remaining_tasks: number;
}

export interface BalanceInfo {
  credits: number;
  credits_enabled: boolean;
  should_charge: boolean;
  own_key: boolean;
}

export interface CreditLedgerOptions {
  mutex?: KeyedMutex;
  /** Reintentos del compare-and-set sobre el balance. */
  maxConflictRetries?: number;
}

export function roundCredits(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/** credits = (tokens / 1000) * rate, redondeado a 4 decimales. */
export function creditsForTokens(tokens: number, ratePer1k: number): number {
  return roundCredits((tokens / 1000) * ratePer1k);
}

function coerceSetting(setting: SystemSetting): number | string | boolean {
  switch (setting.setting_type) {
    case "number":
      return Number(setting.setting_value);
    case "boolean":
      return setting.setting_value === "true";
    default:
      return setting.setting_value;
  }
}

// ─── Ledger ─────────────────────────────────────────────────────────

export class CreditLedger {
  private readonly mutex: KeyedMutex;
  private readonly maxConflictRetries: number;

  constructor(
    private readonly store: Store,
    private readonly logger: FastifyBaseLogger,
    options: CreditLedgerOptions = {},
  ) {
    this.mutex = options.mutex ?? new KeyedMutex();
    this.maxConflictRetries = options.maxConflictRetries ?? 5;
  }

  async getSettings(): Promise<CreditSettings> {
    const settings = { ...DEFAULT_CREDIT_SETTINGS };
    const rows = await this.store.systemSettings.findMany({});

    for (const row of rows) {
      const key = row.setting_key;
      if (key !== "credits_per_1k_tokens_chat" && key !== "credits_per_1k_tokens_project") {
        continue;
      }
      const value = coerceSetting(row);
      if (typeof value === "number" && Number.isFinite(value) && value >= 0) {
        settings[key] = value;
      } else {
        this.logger.warn({ setting: row.setting_key, value: row.setting_value }, "ignoring invalid credit setting");
      }
    }
    return settings;
  }

  async rateFor(tier: CreditTier): Promise<number> {
    const settings = await this.getSettings();
    return tier === "chat" ? settings.credits_per_1k_tokens_chat : settings.credits_per_1k_tokens_project;
  }

  async calculateCredits(tokens: number, tier: CreditTier = "project"): Promise<number> {
    return creditsForTokens(tokens, await this.rateFor(tier));
  }

  // ─── Exencion ─────────────────────────────────────────────────────

  /** Credencial propia activa (prefiere la marcada como default). */
  async getOwnKey(userId: string): Promise<UserAiProvider | null> {
    const providers = await this.store.userAiProviders.findMany({ user_id: userId, is_active: true });
    const withKey = providers.filter((p) => p.api_key !== null && p.api_key.length > 0);
    return withKey.find((p) => p.is_default) ?? withKey[0] ?? null;
  }

  private async requireUser(userId: string): Promise<User> {
    const user = await this.store.users.findOne({ id: userId });
    if (!user) throw new NotFoundError("User");
    return user;
  }

  private async shouldChargeUser(user: User): Promise<boolean> {
    if (!user.credits_enabled) return false;
    return (await this.getOwnKey(user.id)) === null;
  }

  /** false si el usuario tiene creditos deshabilitados o usa su propia key. */
  async shouldCharge(userId: string): Promise<boolean> {
    return this.shouldChargeUser(await this.requireUser(userId));
  }

  async getBalance(userId: string): Promise<BalanceInfo> {
    const user = await this.requireUser(userId);
    const ownKey = (await this.getOwnKey(userId)) !== null;
    return {
      credits: user.credits,
      credits_enabled: user.credits_enabled,
      should_charge: user.credits_enabled && !ownKey,
      own_key: ownKey,
    };
  }

  async getHistory(userId: string, options: { limit?: number; skip?: number } = {}): Promise<CreditLedgerEntry[]> {
    return this.store.creditHistory.findMany(
      { user_id: userId },
      { sort: { field: "created_at", direction: "desc" }, limit: options.limit ?? 50, skip: options.skip ?? 0 },
    );
  }

  // ─── Estimaciones ─────────────────────────────────────────────────

  async estimateJobCost(tasks: Task[], userId: string): Promise<JobCostEstimate> {
    const user = await this.requireUser(userId);
    const rate = await this.rateFor("project");

    const priced = tasks.map((task) => ({
      ...task,
      estimated_credits: creditsForTokens(task.estimated_tokens, rate),
    }));
    const totalTokens = priced.reduce((sum, task) => sum + task.estimated_tokens, 0);

    if (!(await this.shouldChargeUser(user))) {
      return {
        tasks: priced,
        total_estimated_credits: 0,
        total_estimated_tokens: totalTokens,
        breakdown: [],
        user_credits: user.credits,
        sufficient_credits: true,
        free_usage: true,
        message: "Using your own API key or credits are disabled. No credits will be charged.",
      };
    }

    const breakdown: CostBreakdownItem[] = priced.map((task) => ({
      task_id: task.id,
      title: task.title,
      agent: task.agent_type,
      estimated_tokens: task.estimated_tokens,
      estimated_credits: task.estimated_credits,
    }));
    const total = roundCredits(priced.reduce((sum, task) => sum + task.estimated_credits, 0));

    return {
      tasks: priced,
      total_estimated_credits: total,
      total_estimated_tokens: totalTokens,
      breakdown,
      user_credits: user.credits,
      sufficient_credits: user.credits >= total,
      free_usage: false,
    };
  }

  /** Creditos para los tokens estimados sumados de las tasks restantes. */
  async estimateRemainingCost(tasks: Task[]): Promise<number> {
    const tokens = tasks.reduce((sum, task) => sum + task.estimated_tokens, 0);
    return this.calculateCredits(tokens, "project");
  }

  async checkCreditsForContinuation(job: Job): Promise<ContinuationCheck> {
    const user = await this.requireUser(job.user_id);
    const remaining = job.tasks.slice(Math.max(job.current_task_index, 0)).filter((t) => t.status !== "completed");
    const needed = roundCredits(job.credits_unpaid + (await this.estimateRemainingCost(remaining)));

    if (!(await this.shouldChargeUser(user))) {
      return {
        can_continue: true,
        free_usage: true,
        credits_needed: 0,
        user_credits: user.credits,
        shortfall: 0,
        remaining_tasks: remaining.length,
      };
    }

    return {
      can_continue: user.credits >= needed,
      free_usage: false,
      credits_needed: needed,
      user_credits: user.credits,
      shortfall: roundCredits(Math.max(0, needed - user.credits)),
      remaining_tasks: remaining.length,
    };
  }

  // ─── Mutaciones de balance ────────────────────────────────────────

  /**
   * Descuenta `amount`. Tira InsufficientCreditsError si no alcanza (nunca deja
   * el balance negativo). Serializado por usuario con mutex + compare-and-set.
   */
  async deductCredits(
    userId: string,
    amount: number,
    reason: string,
    reference?: LedgerReference,
  ): Promise<BalanceChange> {
    const value = this.requirePositive(amount);

    return this.mutex.runExclusive(userId, async () => {
      for (let attempt = 1; attempt <= this.maxConflictRetries; attempt++) {
        const user = await this.requireUser(userId);

        if (!(await this.shouldChargeUser(user))) {
          return { success: true, charged: 0, balance: user.credits, entry: null };
        }
        if (value > user.credits) {
          throw new InsufficientCreditsError(value, user.credits);
        }

        const balance = roundCredits(user.credits - value);
        const matched = await this.store.users.updateOne({ id: userId, credits: user.credits }, { credits: balance });
        if (matched === 0) {
          this.logger.debug({ userId, attempt }, "balance changed during deduction, retrying");
          continue;
        }

        const entry = await this.recordOrRevert(userId, user.credits, balance, -value, reason, reference);
        return { success: true, charged: value, balance, entry };
      }

      throw new StoreError("deduct", "users", `balance kept changing after ${this.maxConflictRetries} attempts`);
    });
  }

  /** Recarga o reembolso. Siempre deja asiento en el ledger. */
  async addCredits(
    userId: string,
    amount: number,
    reason: string,
    reference?: LedgerReference,
  ): Promise<BalanceChange> {
    const value = this.requirePositive(amount);

    return this.mutex.runExclusive(userId, async () => {
      for (let attempt = 1; attempt <= this.maxConflictRetries; attempt++) {
        const user = await this.requireUser(userId);
        const balance = roundCredits(user.credits + value);
        const matched = await this.store.users.updateOne({ id: userId, credits: user.credits }, { credits: balance });
        if (matched === 0) continue;

        const entry = await this.recordOrRevert(userId, user.credits, balance, value, reason, reference);
        return { success: true, charged: value, balance, entry };
      }

      throw new StoreError("credit", "users", `balance kept changing after ${this.maxConflictRetries} attempts`);
    });
  }

  /**
   * Asienta el movimiento ya aplicado al balance. Si el insert falla vuelve el
   * balance al valor previo (compare-and-set) y relanza: sin asiento no hay movimiento.
   */
  private async recordOrRevert(
    userId: string,
    previous: number,
    balance: number,
    delta: number,
    reason: string,
    reference?: LedgerReference,
  ): Promise<CreditLedgerEntry> {
    try {
      return await this.appendEntry(userId, delta, reason, balance, reference);
    } catch (err) {
      const reverted = await this.store.users.updateOne({ id: userId, credits: balance }, { credits: previous });
      if (reverted === 0) {
        this.logger.error({ userId, delta, balance }, "ledger entry failed and balance could not be reverted");
      } else {
        this.logger.warn({ userId, delta }, "ledger entry failed, balance reverted");
      }
      throw err;
    }
  }

  private requirePositive(amount: number): number {
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new AppError("invalid_amount", `Credit amount must be a positive number, got ${amount}`);
    }
    return roundCredits(amount);
  }

  private async appendEntry(
    userId: string,
    delta: number,
    reason: string,
    balanceAfter: number,
    reference?: LedgerReference,
  ): Promise<CreditLedgerEntry> {
    return this.store.creditHistory.insertOne({
      id: randomUUID(),
      user_id: userId,
      delta,
      reason,
      reference_type: reference?.type ?? null,
      reference_id: reference?.id ?? null,
      balance_after: balanceAfter,
      created_at: new Date().toISOString(),
    });
  }
}
