/**
 * Active Window Detection (Linux)
 *
 * Reports class and title of the focused window.
 * - X11: xprop
 * - GNOME on Wayland: Shell.Eval over gdbus
 *
 * Detection never throws: a failure is logged and yields empty strings,
 * which the matcher treats as ordinary input.
 */

import { execFile } from 'node:child_process'
import type { ActiveWindow } from 'shared/sheet-types'
import { describeError } from '../lib/errors'
import { logger } from '../lib/logger'

export interface WindowDetector {
  detect(): Promise<ActiveWindow>
}

/**
 * Runs a program and resolves with its stdout
 */
export type CommandRunner = (
  file: string,
  args: string[],
  timeoutMs: number
) => Promise<string>

export interface LinuxWindowDetectorOptions {
  run?: CommandRunner
  env?: NodeJS.ProcessEnv
  timeoutMs?: number
}

const EMPTY_WINDOW: ActiveWindow = { wmClass: '', windowTitle: '' }

const GNOME_SHELL_EVAL = [
  'call',
  '-e',
  '-d',
  'org.gnome.Shell',
  '-o',
  '/org/gnome/Shell',
  '-m',
  'org.gnome.Shell.Eval',
]

export const runCommand: CommandRunner = (file, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { encoding: 'utf-8', timeout: timeoutMs },
      (error, stdout) => {
        if (error) {
          reject(error)
        } else {
          resolve(stdout)
        }
      }
    )
  })

export function isUsingWayland(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.WAYLAND_DISPLAY)
}

/**
 * Window id from `xprop -root _NET_ACTIVE_WINDOW`
 */
export function parseActiveWindowId(output: string): string | null {
  const match = output.trim().match(/^_NET_ACTIVE_WINDOW.* (\w+)$/)
  return match ? match[1] : null
}

/**
 * Title and class from `xprop -id <id> WM_NAME WM_CLASS`
 * WM_CLASS lists instance and class; the last entry is the class.
 */
export function parseXpropWindow(output: string): ActiveWindow {
  const name = output.match(/WM_NAME\(\w+\) = "(?<name>.+)"/)
  const wmClass = output.match(/WM_CLASS\(\w+\) =.*"(?<cls>.+?)"$/m)

  return {
    wmClass: wmClass?.groups?.cls ?? '',
    windowTitle: name?.groups?.name ?? '',
  }
}

/**
 * Payload of a Shell.Eval reply such as `(true, '"firefox"')`
 */
export function parseGdbusEvalResult(output: string): string {
  const match = output.match(/'(.+)'/)
  return match ? match[1].replace(/^"+|"+$/g, '') : ''
}

async function detectX11(
  run: CommandRunner,
  timeoutMs: number
): Promise<ActiveWindow> {
  const root = await run('xprop', ['-root', '_NET_ACTIVE_WINDOW'], timeoutMs)
  const windowId = parseActiveWindowId(root)
  if (!windowId) return EMPTY_WINDOW

  const props = await run(
    'xprop',
    ['-id', windowId, 'WM_NAME', 'WM_CLASS'],
    timeoutMs
  )
  return parseXpropWindow(props)
}

async function detectGnomeWayland(
  run: CommandRunner,
  timeoutMs: number
): Promise<ActiveWindow> {
  const evaluate = async (script: string) =>
    parseGdbusEvalResult(
      await run('gdbus', [...GNOME_SHELL_EVAL, script], timeoutMs)
    )

  const index = await evaluate(
    'global.get_window_actors().findIndex(a=>a.meta_window.has_focus()===true)'
  )
  if (!/^\d+$/.test(index)) return EMPTY_WINDOW

  const actor = `global.get_window_actors()[${index}].get_meta_window()`
  const wmClass = await evaluate(`${actor}.get_wm_class()`)
  const windowTitle = await evaluate(`${actor}.get_title()`)

  return { wmClass, windowTitle }
}

export function createLinuxWindowDetector(
  options: LinuxWindowDetectorOptions = {}
): WindowDetector {
  const { run = runCommand, env = process.env, timeoutMs = 3000 } = options

  return {
    async detect() {
      let detected = EMPTY_WINDOW
      try {
        detected = isUsingWayland(env)
          ? await detectGnomeWayland(run, timeoutMs)
          : await detectX11(run, timeoutMs)
      } catch (error) {
        logger.window.error(
          `Couldn't detect active application window: ${describeError(error)}`
        )
      }

      logger.window.debug(
        `Detected wm_class: '${detected.wmClass}'. Detected window_title: '${detected.windowTitle}'.`
      )
      if (!detected.wmClass || !detected.windowTitle) {
        logger.window.warn("Couldn't detect active window")
      }

      return detected
    },
  }
}
