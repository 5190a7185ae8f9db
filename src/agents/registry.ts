import { SubmissionError } from "../errors.js";
import type { Agent } from "./agent.js";

/** Agents in registration order; that order is the scheduler's final tie-break. */
export class AgentRegistry {
  private readonly agents = new Map<string, Agent>();

  add(agent: Agent): void {
    if (this.agents.has(agent.name)) {
      throw new SubmissionError("DUPLICATE_AGENT", `Agent already registered: ${agent.name}`, {
        agent: agent.name,
      });
    }
    this.agents.set(agent.name, agent);
  }

  get(name: string): Agent | null {
    return this.agents.get(name) ?? null;
  }

  has(name: string): boolean {
    return this.agents.has(name);
  }

  remove(name: string): Agent | null {
    const agent = this.agents.get(name);
    if (!agent) {
      return null;
    }
    this.agents.delete(name);
    return agent;
  }

  list(): Agent[] {
    return [...this.agents.values()];
  }

  get size(): number {
    return this.agents.size;
  }

  findByCapability(capability: string): string[] {
    return this.list()
      .filter((agent) => agent.hasCapability(capability))
      .map((agent) => agent.name);
  }
}
