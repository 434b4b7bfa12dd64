import { createApp } from './app'
import { readConfig } from './lib/config'
import { createDictionaryProvider } from './lib/dictionary'

const config = readConfig(process.env)

const app = createApp({
  dictionaries: createDictionaryProvider(config),
  settings: config.solver,
  corsOrigin: config.corsOrigin,
  wordlistsVersion: config.wordlistsVersion,
})

app.listen(config.port, () => {
  console.log(`Wordle Helper API listening on http://localhost:${config.port} (dictionaries: ${config.dictionarySource})`)
})
