// Factory for distro-specific command adapters.
// Unknown dispatch keys fail here, before any process is spawned.
import type { DistributionInfo } from "../../types/distro.js";
import type { DistroCommands } from "./interface.js";
import { ArchCommands } from "./arch.js";
import { DebianCommands } from "./debian.js";
import { FedoraCommands } from "./fedora.js";
import { OpenSuseCommands } from "./opensuse.js";
import { familyOf } from "../dispatch.js";
import { SetupError, SetupErrorCode } from "../../shared/errors.js";
import { ok, fail, type Result } from "../../shared/result.js";
import { logger } from "../../shared/logger.js";

/** Create the DistroCommands implementation for a distribution's dispatch key. */
export function createDistroCommands(distro: Pick<DistributionInfo, "name">): Result<DistroCommands> {
  const family = familyOf(distro.name);
  switch (family) {
    case "arch": return ok(new ArchCommands());
    case "debian": return ok(new DebianCommands());
    case "fedora": return ok(new FedoraCommands());
    case "opensuse": return ok(new OpenSuseCommands());
    case null:
      logger.error({ distroName: distro.name }, "No package-manager dispatch for distribution");
      return fail(new SetupError(SetupErrorCode.UNSUPPORTED_PLATFORM, `Unsupported distribution: ${distro.name}`));
  }
}
