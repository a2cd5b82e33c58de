import React from 'react'
import ReactDOM from 'react-dom/client'
import App from './App'
import { DEFAULT_CONFIG, loadConfig } from './config'
import type { GameConfig } from './config'
import { ConfigError } from './errors'
import { logger, setLogLevel } from './logger'

function readConfig(): GameConfig {
  try {
    return loadConfig(window.location.search)
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err
    logger.warn('ignoring query overrides', { issues: err.issues })
    return DEFAULT_CONFIG
  }
}

const cfg = readConfig()
setLogLevel(cfg.logLevel)
logger.info('starting', { seed: cfg.seed ?? null, chase: cfg.chase, maze: `${cfg.mazeWidth}x${cfg.mazeHeight}` })

const root = document.getElementById('root')
if (!root) throw new Error('missing #root element')

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    <App cfg={cfg} />
  </React.StrictMode>
)
