/**
 * Agents: `/agents`
 */

import type { AgentInput } from "@otc/types";
import type { OpenToCloseHttpClient } from "../http-client";
import { AGENT_RULES } from "../rules";
import { Resource } from "./resource";

export class AgentsResource extends Resource<AgentInput> {
  constructor(http: OpenToCloseHttpClient) {
    super(http, {
      name: "Agent",
      plural: "agents",
      path: "/agents",
      rules: AGENT_RULES,
    });
  }
}
