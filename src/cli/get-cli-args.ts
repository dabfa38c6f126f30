import { parseArgs, type ParseArgsConfig } from 'util'
import { BASE_CONFIG, PRESETS, isPresetName, type ExperimentConfig } from '../conf/experiment-config'
import { ConfigurationError, describeError } from '../core/errors'
import { validateConfig } from '../conf/validate-config'

const isConfigKey = (key: string): key is keyof ExperimentConfig => key in BASE_CONFIG

const getTypeThenCast = (keyString: string, value: string | boolean): Partial<Record<string, unknown>> => {
  const key = keyString.toUpperCase()
  if (!isConfigKey(key)) throw new ConfigurationError(['Invalid command line argument: ' + keyString])
  const base = BASE_CONFIG[key]
  if (typeof base === 'number') {
    return { [key]: Number(value) }
  }
  if (typeof base === 'string') {
    return { [key]: String(value) }
  }
  return {
    [key]: typeof value === 'boolean' ? value : value === 'true',
  }
}

const selectPreset = (name: string | boolean | (string | boolean)[] | undefined, fallback: ExperimentConfig) => {
  if (typeof name !== 'string') return fallback
  if (!isPresetName(name)) {
    throw new ConfigurationError([`Unknown preset "${name}", expected one of: ${Object.keys(PRESETS).join(', ')}`])
  }
  return PRESETS[name]
}

const parseOrThrow = <T extends Pick<ParseArgsConfig, 'args' | 'options'>>(config: T) => {
  try {
    return parseArgs({ ...config, strict: true, allowPositionals: true })
  } catch (e) {
    throw new ConfigurationError([describeError(e)])
  }
}

/**
 *  Get command line arguments to override configurations, `--preset` picks
 *  the configuration the overrides apply to. The merged
 *  configuration is validated before it is returned.
 */
export function getCliArgs(args: string[] = process.argv.slice(2), baseConfig: ExperimentConfig = BASE_CONFIG) {
  /**
   *  Allow overriding specific options via the cli.
   */
  const options = Object.entries(baseConfig).reduce<Record<string, { type: 'boolean' | 'string'; short?: string }>>(
    (params, [name, value]) => {
      return {
        ...params,
        [name.toLowerCase()]: {
          type: typeof value === 'boolean' ? 'boolean' : 'string',
        },
      }
    },
    {}
  )

  const { values } = parseOrThrow({
    args,
    options: {
      ...options,
      message: {
        short: 'm',
        type: 'string',
      },
      seed: {
        short: 's',
        type: 'string',
      },
      verbose: {
        short: 'v',
        type: 'boolean',
      },
      preset: {
        short: 'p',
        type: 'string',
      },
    },
  })

  const { preset, ...rest } = values
  const base = selectPreset(preset, baseConfig)

  const overrides = Object.entries(rest).reduce<Record<string, unknown>>((output, [key, value]) => {
    if (value === undefined || Array.isArray(value)) return output
    return {
      ...output,
      ...getTypeThenCast(key, value),
    }
  }, {})

  return validateConfig({ ...base, ...overrides })
}
