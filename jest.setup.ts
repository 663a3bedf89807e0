import dotenv from "dotenv";

// Suppress dotenv logging
const originalLog = console.log;
console.log = (...args: unknown[]) => {
  if (typeof args[0] === "string" && args[0].includes("[dotenv")) {
    return;
  }
  originalLog(...args);
};

dotenv.config({ path: "./.env.local" });

// Restore original console.log
console.log = originalLog;

// Keep workflow logging out of the test output and off the disk
process.env.WORKFLOW_LOG_LEVEL = "ERROR";
process.env.WORKFLOW_FILE_LOGGING_ENABLED = "false";
