import { logger } from "@forecast-synthesis/core";

// Keep test output readable; individual tests install their own handlers.
logger.setLevel("error");
