/**
 * Container Runtime
 *
 * Thin wrappers over the Docker CLI
 */

import { spawn } from 'node:child_process'
import type { ContainerSpec } from '../types'

export type ContainerRuntime = 'docker' | null

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

/**
 * Runs a command to completion. Never rejects: a command that cannot be
 * spawned resolves with exit code 127.
 */
export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>

export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve) => {
    let stdout = ''
    let stderr = ''

    const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] })
    proc.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString()
    })
    proc.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString()
    })
    proc.on('error', (error) => {
      resolve({ exitCode: 127, stdout, stderr: stderr || error.message })
    })
    proc.on('close', (code) => {
      resolve({ exitCode: code ?? 1, stdout, stderr })
    })
  })

/**
 * Detect available container runtime
 */
export async function detectContainerRuntime(run: CommandRunner = runCommand): Promise<ContainerRuntime> {
  const { exitCode } = await run('docker', ['--version'])
  return exitCode === 0 ? 'docker' : null
}

/**
 * Container names known to Docker, one per line of `docker ps`
 */
export async function listContainers(run: CommandRunner = runCommand, options: { all?: boolean } = {}): Promise<string[]> {
  const args = ['ps', ...(options.all ? ['-a'] : []), '--format', '{{.Names}}']
  const result = await run('docker', args)
  if (result.exitCode !== 0) {
    throw new Error(`docker ps failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`)
  }
  return result.stdout
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean)
}

/**
 * Create a bridge network
 *
 * @returns false when the network already existed
 */
export async function ensureNetwork(name: string, run: CommandRunner = runCommand): Promise<boolean> {
  const result = await run('docker', ['network', 'create', '--driver', 'bridge', name])
  if (result.exitCode === 0) return true
  if (/already exists/i.test(result.stderr)) return false
  throw new Error(`docker network create failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`)
}

/**
 * Arguments for `docker run` that create and start the container detached
 */
export function dockerRunArgs(spec: ContainerSpec): string[] {
  const { name, image, network, env = {}, ports = [], volumes = [], command = [] } = spec
  const args = ['run', '-d', '--name', name]

  if (network) {
    args.push('--network', network)
  }

  for (const [key, value] of Object.entries(env)) {
    args.push('-e', `${key}=${value}`)
  }

  for (const { host, container } of ports) {
    args.push('-p', `${host}:${container}`)
  }

  for (const volume of volumes) {
    args.push('-v', `${volume.name}:${volume.path}`)
  }

  args.push(image, ...command)
  return args
}

/**
 * Start an existing stopped container
 */
export async function startContainer(name: string, run: CommandRunner = runCommand): Promise<void> {
  const result = await run('docker', ['start', name])
  if (result.exitCode !== 0) {
    throw new Error(`docker start ${name} failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`)
  }
}

/**
 * Create and start a new container
 */
export async function runContainerDocker(spec: ContainerSpec, run: CommandRunner = runCommand): Promise<void> {
  const result = await run('docker', dockerRunArgs(spec))
  if (result.exitCode !== 0) {
    throw new Error(`docker run ${spec.name} failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`)
  }
}
