import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { ExecOptions, ToolRunner } from '../src/pipeline/exec';
import type { ExecResult, ToolId } from '../src/types';

export interface FakeCall {
  tool: ToolId;
  args: string[];
  options?: ExecOptions;
}

export type FakeBehavior = (call: FakeCall) => Promise<Partial<ExecResult>> | Partial<ExecResult>;

export function fakeRunner(behavior: FakeBehavior = () => ({})): { run: ToolRunner; calls: FakeCall[] } {
  const calls: FakeCall[] = [];
  const run: ToolRunner = async (tool, args, options) => {
    const call = { tool, args, options };
    calls.push(call);
    const result = await behavior(call);
    return { stdout: '', stderr: '', exitCode: 0, durationMs: 1, ...result };
  };
  return { run, calls };
}

/** The file a PDF tool invocation writes to. */
export function outputPathOf(call: FakeCall): string {
  const o = call.args.indexOf('-o');
  return o >= 0 ? call.args[o + 1] : call.args[call.args.length - 1];
}

/** The PDF a tool invocation reads. */
export function inputPathOf(call: FakeCall): string {
  return call.tool === 'gs' ? call.args[call.args.length - 1] : call.args[call.args.length - 2];
}

export async function writeBytes(path: string, size: number): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, Buffer.alloc(size, 0x25));
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'pdfwork-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
