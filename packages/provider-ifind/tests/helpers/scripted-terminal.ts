/**
 * @fileoverview In-process upstream terminal answering from a script.
 */

import type { UpstreamOperation, UpstreamTerminal } from '../../src/upstream/types.js';

export type Responder = (operation: UpstreamOperation, params: readonly string[]) => unknown;

export interface RecordedCall {
  operation: UpstreamOperation;
  params: string[];
}

export class ScriptedTerminal implements UpstreamTerminal {
  readonly calls: RecordedCall[] = [];
  loginCalls = 0;
  logoutCalls = 0;

  constructor(
    private readonly responder: Responder,
    private readonly loginCode: () => number = () => 0
  ) {}

  async login(): Promise<number> {
    this.loginCalls++;
    return this.loginCode();
  }

  async logout(): Promise<void> {
    this.logoutCalls++;
  }

  async invoke(operation: UpstreamOperation, ...params: string[]): Promise<unknown> {
    this.calls.push({ operation, params });
    return this.responder(operation, params);
  }
}
