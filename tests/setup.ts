/**
 * Test setup - silences the root logger so handler and session warnings
 * don't clutter test output.
 */

import { createLogger, setRootLogger } from "../src/utils/logger";

setRootLogger(createLogger("silent"));
