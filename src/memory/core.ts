import type { IdentityConfig } from "../config/types.js";
import type { MemoryStore } from "./store.js";
import { CORE_BLOCK_LIMITS, type CoreBlock, type CoreBlockName } from "./types.js";

export function defaultPersona(agentName: string, identity: IdentityConfig): string {
  return `Name: ${agentName}\nDescription: ${identity.description}\nTone: ${identity.tone}`;
}

export class CoreMemory {
  constructor(private readonly store: MemoryStore) {}

  /** Seeds all four blocks if absent. The persona comes from identity configuration only. */
  init(agentName: string, identity: IdentityConfig, mission: string, objectives: string[]): void {
    this.store.initCoreBlock("persona", defaultPersona(agentName, identity), CORE_BLOCK_LIMITS.persona);
    this.store.initCoreBlock(
      "goals",
      `Mission: ${mission}\nObjectives: ${objectives.join("; ")}`,
      CORE_BLOCK_LIMITS.goals,
    );
    this.store.initCoreBlock("social_graph", "(No relationships yet)", CORE_BLOCK_LIMITS.social_graph);
    this.store.initCoreBlock(
      "domain_knowledge",
      "(No knowledge yet)",
      CORE_BLOCK_LIMITS.domain_knowledge,
    );
  }

  get(name: CoreBlockName): CoreBlock | null {
    return this.store.getCoreBlock(name);
  }

  all(): CoreBlock[] {
    return this.store.getCoreBlocks();
  }

  /** Rewrites a non-persona block. Returns true when the stored content changed. */
  update(name: Exclude<CoreBlockName, "persona">, content: string): boolean {
    const block = this.store.getCoreBlock(name);
    if (!block) return false;
    const next = content.trim().slice(0, block.charLimit);
    if (next.length === 0 || next === block.content) return false;
    return this.store.setCoreBlock(name, next);
  }

  /** Blocks rendered as "[name]\ncontent", separated by blank lines. */
  contextBlocks(): string {
    return this.all()
      .map((block) => `[${block.name}]\n${block.content}`)
      .join("\n\n");
  }
}
