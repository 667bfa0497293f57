import { configure, getConsoleSink } from "@logtape/logtape"

// Only surface real problems while tests run
await configure({
  reset: true,
  sinks: {
    console: getConsoleSink(),
  },
  loggers: [
    {
      category: ["shift-ledger"],
      lowestLevel: "fatal",
      sinks: ["console"],
    },
    {
      category: ["logtape", "meta"],
      lowestLevel: "warning",
      sinks: ["console"],
    },
  ],
})
