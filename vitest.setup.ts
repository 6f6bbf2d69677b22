import { logger } from "@trend-evidence/core";

// Keep test output to failures
logger.setLevel("error");
