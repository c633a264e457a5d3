import { parseEnv } from './config/env.js'
import { buildApp } from './app.js'

async function main() {
  const env = parseEnv(process.env)
  const app = await buildApp(env)

  try {
    await app.cache.connect()
    await app.listen({ host: env.HOST, port: env.PORT })
  } catch (err) {
    app.log.fatal(err, 'Failed to start server')
    process.exit(1)
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Received shutdown signal')
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, 'Error during shutdown')
          process.exit(1)
        }
      )
    })
  }
}

void main()
