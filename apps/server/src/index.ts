import 'dotenv/config'
import { loadConfig } from './config.js'
import { buildServer } from './app.js'
import { NAMESPACE } from './realtime/gameBroadcaster.js'

const config = loadConfig()
const { fastify, gameService } = await buildServer({ config })

gameService.startSweeper()

async function shutdown(signal: string): Promise<void> {
  console.log(`${signal} received, starting graceful shutdown...`)
  await fastify.close()
  console.log('Server closed gracefully')
  process.exit(0)
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch(err => {
    fastify.log.error(err)
    process.exit(1)
  })
})

process.on('SIGINT', () => {
  shutdown('SIGINT').catch(err => {
    fastify.log.error(err)
    process.exit(1)
  })
})

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

try {
  await fastify.listen({ port: config.port, host: config.host })

  console.log(JSON.stringify({
    evt: 'server.start',
    port: config.port,
    namespace: NAMESPACE,
    board: `${config.engine.rows}x${config.engine.columns}`,
    connect: config.engine.connect,
  }))
} catch (err) {
  if (isErrnoException(err) && err.code === 'EADDRINUSE') {
    console.log(JSON.stringify({
      evt: 'server.error',
      error: 'EADDRINUSE',
      port: config.port,
      message: `Port ${config.port} is already in use`,
    }))
    process.exit(1)
  }
  fastify.log.error(err)
  process.exit(1)
}
