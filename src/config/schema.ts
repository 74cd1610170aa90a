import type { BranchUpdateMode } from "../git/engine.js";
import type { ReferenceProtocol } from "../repo/reference.js";
import type { BranchFailurePolicy } from "../sync/synchronizer.js";

export interface ResolvedRepoMirrorConfig {
  github: {
    /** Empty when neither the config file nor ORGANIZATION provide one. */
    organization: string;
    api_url: string;
    /** Hosts that receive the token when cloning and fetching over HTTPS. */
    auth_hosts: string[];
  };
  list: {
    protocol: ReferenceProtocol;
    exclude: string[];
    include_archived: boolean;
  };
  sync: {
    output_dir: string;
    prune: boolean;
    update_mode: BranchUpdateMode;
    branch_failure: BranchFailurePolicy;
  };
  logging: {
    dir: string;
    file: boolean;
  };
}
