#!/usr/bin/env node

import "dotenv/config";
import { reportCrash, runApp } from "./app.js";

process.on("uncaughtException", (err) => {
  reportCrash("UNCAUGHT EXCEPTION", err);
});
process.on("unhandledRejection", (reason) => {
  reportCrash("UNHANDLED REJECTION", reason);
});

runApp()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    reportCrash("FATAL ERROR", error);
  });
