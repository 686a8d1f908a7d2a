import { Client, ConfigBuilder, DeliveryError, MemoryHttpClient, PinoLogger } from "@tattletale/notifier"
import { loadExampleEnv } from "./config"

// Without an API key notices go to an in-memory endpoint and are printed.
const env = loadExampleEnv(process.env)
const logger = new PinoLogger({}, { level: env.LOG_LEVEL, prettify: env.LOG_PRETTY }, {
  service: "example-basic",
})

const memory = env.HONEYBADGER_API_KEY ? undefined : new MemoryHttpClient()

const config = new ConfigBuilder(env.HONEYBADGER_API_KEY ?? "test-key")
  .withEnvironment("example")
  .build()

const client = new Client(config, { logger, httpClient: memory })

class CheckoutError extends Error {
  override name = "CheckoutError"
}

const samples: Array<[string, unknown]> = [
  [
    "chained",
    new CheckoutError("payment step failed", {
      cause: new Error("card declined", { cause: new Error("issuer timeout") }),
    }),
  ],
  [
    "aggregate",
    new AggregateError([new Error("shard 1 down"), new RangeError("shard 2 full")], "2 shards failed"),
  ],
  ["opaque", "plain string thrown by a dependency"],
]

for (const [shape, error] of samples) {
  try {
    await client.notify(error, { shape })
    logger.info("Notice accepted", { shape })
  } catch (err) {
    if (!(err instanceof DeliveryError)) throw err

    logger.warn("Notice not accepted", { shape, outcome: err.outcome.kind, err })
  }
}

if (memory) {
  memory.requests.forEach((_, i) => {
    logger.info("Captured notice", { notice: memory.body(i) })
  })
}
