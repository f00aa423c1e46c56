import fs from "fs/promises";
import cron from "node-cron";
import { z } from "zod";

// Longest delay Node timers accept (2^31 - 1 ms), in whole seconds
export const MAX_TIMER_SECONDS = 2_147_483;

const seconds = () => z.number().positive().max(MAX_TIMER_SECONDS);

export const DataSourceConfigSchema = z
  .object({
    source_type: z.string().min(1),
  })
  .passthrough();

export const AgentConfigSchema = z.object({
  agent_id: z.string().min(1),
  agent_class: z.string().min(1),
  prediction_interval_seconds: seconds(),
  // Passed verbatim to the agent's configure()
  config: z.record(z.unknown()).default({}),
  // Logical source name -> source identifier from the top-level data_sources
  data_sources: z.record(z.string().min(1)).default({}),
  cron_schedule: z.string().min(1).optional(),
});

export const PolicySchema = z
  .object({
    max_consecutive_faults: z.number().int().positive().default(3),
    backoff_initial_seconds: seconds().default(30),
    backoff_max_seconds: seconds().default(600),
    fetch_timeout_seconds: seconds().default(5),
    publish_timeout_seconds: seconds().default(5),
    shutdown_grace_seconds: z.number().nonnegative().max(MAX_TIMER_SECONDS).default(10),
  })
  .default({});

const ConfigPayloadSchema = z.object({
  agents: z.array(z.unknown()),
  data_sources: z.record(z.unknown()).default({}),
  policy: z.unknown().optional(),
});

export type DataSourceConfig = z.infer<typeof DataSourceConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;

export interface RuntimePolicy {
  maxConsecutiveFaults: number;
  backoffInitialMs: number;
  backoffMaxMs: number;
  fetchTimeoutMs: number;
  publishTimeoutMs: number;
  shutdownGraceMs: number;
}

export interface ValidatedConfig {
  agents: AgentConfig[];
  dataSources: Record<string, DataSourceConfig>;
  policy: RuntimePolicy;
}

export interface KnownImplementations {
  agentClasses: ReadonlySet<string>;
  sourceKinds: ReadonlySet<string>;
}

export interface ConfigValidation {
  config: ValidatedConfig;
  violations: string[];
}

export const DEFAULT_POLICY: RuntimePolicy = toRuntimePolicy(PolicySchema.parse(undefined));

/**
 * Check a raw configuration payload. Every violation is collected; entries
 * that fail their own schema are left out of the returned config.
 */
export function validateConfig(
  raw: unknown,
  known: KnownImplementations
): ConfigValidation {
  const violations: string[] = [];
  const config: ValidatedConfig = {
    agents: [],
    dataSources: {},
    policy: DEFAULT_POLICY,
  };

  const payload = ConfigPayloadSchema.safeParse(raw);
  if (!payload.success) {
    violations.push(...formatIssues(payload.error));
    return { config, violations };
  }

  const policy = PolicySchema.safeParse(payload.data.policy);
  if (policy.success) {
    config.policy = toRuntimePolicy(policy.data);
    if (config.policy.backoffMaxMs < config.policy.backoffInitialMs) {
      violations.push(
        "policy.backoff_max_seconds: must not be smaller than backoff_initial_seconds"
      );
    }
  } else {
    violations.push(...formatIssues(policy.error, "policy"));
  }

  for (const [name, entry] of Object.entries(payload.data.data_sources)) {
    const parsed = DataSourceConfigSchema.safeParse(entry);
    if (!parsed.success) {
      violations.push(...formatIssues(parsed.error, `data_sources.${name}`));
      continue;
    }
    if (!known.sourceKinds.has(parsed.data.source_type)) {
      violations.push(
        `data_sources.${name}: unknown source_type "${parsed.data.source_type}"`
      );
    }
    config.dataSources[name] = parsed.data;
  }

  const seenIds = new Set<string>();
  payload.data.agents.forEach((entry, index) => {
    const parsed = AgentConfigSchema.safeParse(entry);
    if (!parsed.success) {
      violations.push(...formatIssues(parsed.error, `agents[${index}]`));
      return;
    }

    const agent = parsed.data;
    let valid = true;

    if (seenIds.has(agent.agent_id)) {
      violations.push(`agents[${index}]: duplicate agent_id "${agent.agent_id}"`);
      valid = false;
    }
    seenIds.add(agent.agent_id);

    if (!known.agentClasses.has(agent.agent_class)) {
      violations.push(
        `agent "${agent.agent_id}": agent_class "${agent.agent_class}" is not registered`
      );
      valid = false;
    }

    for (const [logical, sourceId] of Object.entries(agent.data_sources)) {
      if (!Object.hasOwn(payload.data.data_sources, sourceId)) {
        violations.push(
          `agent "${agent.agent_id}": data source "${sourceId}" (as "${logical}") is not defined in data_sources`
        );
        valid = false;
      }
    }

    if (agent.cron_schedule !== undefined && !cron.validate(agent.cron_schedule)) {
      violations.push(
        `agent "${agent.agent_id}": invalid cron_schedule "${agent.cron_schedule}"`
      );
      valid = false;
    }

    if (valid) {
      config.agents.push(agent);
    }
  });

  return { config, violations };
}

/**
 * Read a JSON configuration payload from disk
 */
export async function loadConfigFile(path: string): Promise<unknown> {
  const content = await fs.readFile(path, "utf-8");
  return JSON.parse(content);
}

function toRuntimePolicy(policy: z.infer<typeof PolicySchema>): RuntimePolicy {
  return {
    maxConsecutiveFaults: policy.max_consecutive_faults,
    backoffInitialMs: policy.backoff_initial_seconds * 1000,
    backoffMaxMs: policy.backoff_max_seconds * 1000,
    fetchTimeoutMs: policy.fetch_timeout_seconds * 1000,
    publishTimeoutMs: policy.publish_timeout_seconds * 1000,
    shutdownGraceMs: policy.shutdown_grace_seconds * 1000,
  };
}

export function formatIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const path = formatPath(prefix, issue.path);
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function formatPath(prefix: string | undefined, path: (string | number)[]): string {
  let result = prefix ?? "";
  for (const segment of path) {
    if (typeof segment === "number") {
      result += `[${segment}]`;
    } else {
      result += result ? `.${segment}` : segment;
    }
  }
  return result;
}
