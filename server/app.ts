import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express'
import cors from 'cors'
import { createHash } from 'crypto'
import { calculateNextMove, computeLetterScores, suggestFillers, type SolverDeps } from './lib/api'
import { httpStatusFor, SolverError, SolverErrorCodes, SolverInputError, toErrorBody } from './lib/errors'

export interface AppDeps extends SolverDeps {
  corsOrigin: string
  wordlistsVersion: string
}

interface DictionaryMeta {
  id: string
  count: number
  sha256: string
}

// Express 4 does not forward rejected promises to the error middleware on its own
const asyncRoute = (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next)
  }

// body-parser tags its client errors (bad JSON, too large, unsupported charset) with a type and a 4xx status
function bodyParserError(err: unknown): SolverInputError | undefined {
  if (!(err instanceof Error) || !('type' in err) || typeof err.type !== 'string') return undefined
  if (!('status' in err) || typeof err.status !== 'number' || err.status >= 500) return undefined
  if (err instanceof SyntaxError) return new SolverInputError('Request body is not valid JSON')
  return new SolverInputError(`Request body rejected: ${err.message}`)
}

export function createApp(deps: AppDeps): express.Express {
  const app = express()
  // Allow CORS for the web client and local dev
  app.use(cors({ origin: deps.corsOrigin }))
  app.use(express.json())

  // Simple health check for uptime pings and client readiness
  app.get('/api/health', (_req, res) => {
    res.json({ ok: true, service: 'wordle-helper', timestamp: Date.now() })
  })

  // Stateless solver: the client sends its whole guess history on every call
  app.post('/api/next-move', asyncRoute(async (req, res) => {
    res.json(await calculateNextMove(req.body, deps))
  }))

  app.post('/api/filler', asyncRoute(async (req, res) => {
    res.json(await suggestFillers(req.body, deps))
  }))

  app.post('/api/letter-scores', asyncRoute(async (req, res) => {
    res.json(await computeLetterScores(req.body, deps))
  }))

  /* Metadata about every available dictionary, so clients can tell when a cached copy is stale.
  Dictionaries that fail to load are left out rather than failing the whole listing. */
  app.get('/wordlists/meta.json', asyncRoute(async (_req, res) => {
    const ids = await deps.dictionaries.list()
    const settled = await Promise.allSettled(ids.map(async id => {
      const words = await deps.dictionaries.load(id)
      const sha256 = createHash('sha256').update(JSON.stringify(words)).digest('hex')
      return { id, count: words.length, sha256 }
    }))
    const dictionaries: DictionaryMeta[] = []
    for (const [i, result] of settled.entries()) {
      if (result.status === 'fulfilled') {
        dictionaries.push(result.value)
      } else if (result.reason instanceof SolverError) {
        console.warn(`[wordlists] skipping ${ids[i]}: ${result.reason.message}`)
      } else {
        throw result.reason
      }
    }
    res.setHeader('Cache-Control', 'public, max-age=3600, s-maxage=3600')
    res.json({ version: deps.wordlistsVersion, dictionaries, generatedAt: Date.now() })
  }))

  app.get('/wordlists/:dictionary', asyncRoute(async (req, res) => {
    const words = await deps.dictionaries.load(req.params.dictionary)
    res.setHeader('Cache-Control', 'public, max-age=86400, s-maxage=86400')
    res.json(words)
  }))

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const error = bodyParserError(err) ?? err
    const body = toErrorBody(error)
    if (body.error === SolverErrorCodes.INTERNAL_ERROR) {
      console.error('[api] unexpected error', err)
    }
    res.status(httpStatusFor(body.error)).json(body)
  })

  return app
}
