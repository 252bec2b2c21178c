import type { UserInput } from "@otc/types";
import type { OpenToCloseHttpClient } from "../http-client";
import { USER_RULES } from "../rules";
import { Resource } from "./resource";

export class UsersResource extends Resource<UserInput> {
  constructor(http: OpenToCloseHttpClient) {
    super(http, {
      name: "User",
      plural: "users",
      path: "/users",
      rules: USER_RULES,
    });
  }
}
