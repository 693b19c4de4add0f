import * as os from "node:os";

import type { HardwareInfo } from "../types/index.js";

export const hostHardware: HardwareInfo = {
  availableParallelism: () => Math.max(1, os.availableParallelism()),
};
