import type { ResolvedRepoMirrorConfig } from "./schema.js";

export const defaultConfig: ResolvedRepoMirrorConfig = {
  github: {
    organization: "",
    api_url: "https://api.github.com",
    auth_hosts: ["github.com"]
  },
  list: {
    protocol: "ssh",
    exclude: [],
    include_archived: true
  },
  sync: {
    output_dir: "./repos",
    prune: false,
    update_mode: "fast-forward",
    branch_failure: "warn"
  },
  logging: {
    dir: "logs",
    file: true
  }
};
