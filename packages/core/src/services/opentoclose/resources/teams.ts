import type { TeamInput } from "@otc/types";
import type { OpenToCloseHttpClient } from "../http-client";
import { TEAM_RULES } from "../rules";
import { Resource } from "./resource";

export class TeamsResource extends Resource<TeamInput> {
  constructor(http: OpenToCloseHttpClient) {
    super(http, {
      name: "Team",
      plural: "teams",
      path: "/teams",
      rules: TEAM_RULES,
    });
  }
}
