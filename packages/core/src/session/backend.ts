/**
 * Backend selection
 *
 * Difficulty labels route an issue to a backend kind and model; unlabelled
 * issues use the default backend. Commands are argv templates with `{model}`
 * and `{prompt}` placeholders.
 */

import type { Issue } from '@drover/linear'
import type { DroverConfig } from '../config/drover-config.js'
import { ConfigurationError } from '../errors.js'
import { MARKER_FILE, TASK_FILE } from '../workspace/completion-marker.js'

export type BackendSettings = DroverConfig['backends']

export interface BackendChoice {
  backend: string
  /** Empty when neither the route nor the defaults name a model */
  model: string
}

export function selectBackend(issue: Issue, settings: BackendSettings): BackendChoice {
  const route = issue.difficulty ? settings.difficulty[issue.difficulty] : undefined
  const backend = route?.backend ?? settings.default
  const model = route?.model ?? settings.defaultModels[backend] ?? ''
  return { backend, model }
}

export function renderPrompt(template: string): string {
  return template.replace(/\{taskFile\}/g, TASK_FILE).replace(/\{markerFile\}/g, MARKER_FILE)
}

/**
 * Substitute placeholders. A bare `{model}` token with no model is dropped
 * together with the flag in front of it.
 */
export function renderCommand(template: readonly string[], values: { model: string; prompt: string }): string[] {
  const argv: string[] = []
  for (const token of template) {
    if (token === '{model}' && !values.model) {
      if (argv.length > 1 && argv[argv.length - 1].startsWith('-')) argv.pop()
      continue
    }
    argv.push(token.replace(/\{model\}/g, values.model).replace(/\{prompt\}/g, values.prompt))
  }
  return argv
}

export function commandFor(choice: BackendChoice, settings: BackendSettings): string[] {
  const template = settings.commands[choice.backend]
  if (!template) {
    throw new ConfigurationError(`No command configured for backend "${choice.backend}"`, { backend: choice.backend })
  }
  return renderCommand(template, { model: choice.model, prompt: renderPrompt(settings.prompt) })
}
