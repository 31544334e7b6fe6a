/**
 * Session Relay
 *
 * Bridges one downstream client connection and one upstream Voice Live
 * connection for the lifetime of a call:
 * - Downstream audio is queued and drained upstream by the sender loop
 * - Upstream events are handled in arrival order by the receiver loop
 * - Function calls requested upstream are answered from the session's tools
 *
 * Lifecycle: attachDownstream() -> connect() -> ... -> cleanup()
 */

import { randomUUID } from 'crypto';
import { AsyncQueue } from './async-queue.js';
import { decodeAudio, toBase64Audio } from './audio-utils.js';
import type { RelayConfig } from './config.js';
import type { ConnectionRegistry } from './connection-registry.js';
import type { DownstreamTransport } from './downstream.js';
import {
  audioDataEnvelope,
  functionCallOutput,
  inputAudioAppend,
  isRecord,
  parseTelephonyAudio,
  parseUpstreamMessage,
  responseCreate,
  stopAudioEnvelope,
  transcriptionEnvelope,
  type ConnectionType,
  type DownstreamEnvelope,
  type FunctionCallArgumentsDoneEvent,
  type ParsedUpstreamMessage,
  type TranscriptEntry,
  type UpstreamEvent,
  type UpstreamOutboundMessage,
} from './protocol.js';
import type { CredentialProvider, EmailProvider } from './providers/types.js';
import { buildSessionUpdate, createToolRegistry, type ToolContext } from './tools/index.js';
import { ToolNotFoundError, type ToolRegistry } from './tools/registry.js';
import type { ToolArguments, ToolResult } from './tools/types.js';
import { buildRealtimeUrl, connectWebSocketUpstream, type UpstreamConnector, type UpstreamTransport } from './upstream.js';

export type RelayState =
  | 'uninitialized'
  | 'registering'
  | 'rejected'
  | 'connecting'
  | 'failed'
  | 'streaming'
  | 'closing'
  | 'closed';

export class ConnectionLimitExceededError extends Error {
  constructor(readonly connectionId: string) {
    super('Connection limit reached. Please try again later.');
    this.name = 'ConnectionLimitExceededError';
  }
}

export class InvalidToolArgumentsError extends Error {
  constructor(toolName: string, reason: string) {
    super(`Invalid arguments for tool ${toolName}: ${reason}`);
    this.name = 'InvalidToolArgumentsError';
  }
}

export interface SessionRelayOptions {
  config: RelayConfig;
  registry: ConnectionRegistry;
  credentials: CredentialProvider;
  emailProvider: EmailProvider;
  /** Opens the upstream transport; defaults to a WebSocket connection */
  connectUpstream?: UpstreamConnector;
  /** Builds the session's tool registry; defaults to the reference tools */
  createTools?: (context: ToolContext) => ToolRegistry;
}

export interface DownstreamOptions {
  connectionType: ConnectionType;
  callerId?: string;
}

/**
 * Decode function-call arguments, which arrive either as an object or as JSON text
 */
export function decodeToolArguments(toolName: string, raw: unknown): ToolArguments {
  if (raw === undefined || raw === null || raw === '') {
    return {};
  }

  let value = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch {
      throw new InvalidToolArgumentsError(toolName, 'arguments are not valid JSON');
    }
  }

  if (!isRecord(value)) {
    throw new InvalidToolArgumentsError(toolName, 'arguments must be a JSON object');
  }
  return value;
}

export class SessionRelay {
  readonly connectionId: string = randomUUID();
  readonly startedAt = new Date();

  private readonly config: RelayConfig;
  private readonly registry: ConnectionRegistry;
  private readonly credentials: CredentialProvider;
  private readonly emailProvider: EmailProvider;
  private readonly connectUpstream: UpstreamConnector;
  private readonly createTools: (context: ToolContext) => ToolRegistry;

  private relayState: RelayState = 'uninitialized';
  private registered = false;
  private downstream: DownstreamTransport | null = null;
  private upstream: UpstreamTransport | null = null;
  private tools: ToolRegistry | null = null;
  private outbound = new AsyncQueue<string>();
  private transcript: TranscriptEntry[] = [];
  private senderLoop: Promise<void> | null = null;
  private receiverLoop: Promise<void> | null = null;
  private cleanupPromise: Promise<void> | null = null;

  private sessionCallerId: string | undefined;
  private sessionConnectionType: ConnectionType = 'web';
  private upstreamSession: string | undefined;

  constructor(options: SessionRelayOptions) {
    this.config = options.config;
    this.registry = options.registry;
    this.credentials = options.credentials;
    this.emailProvider = options.emailProvider;
    this.connectUpstream = options.connectUpstream ?? connectWebSocketUpstream;
    this.createTools = options.createTools ?? createToolRegistry;
  }

  get state(): RelayState {
    return this.relayState;
  }

  get callerId(): string | undefined {
    return this.sessionCallerId;
  }

  get connectionType(): ConnectionType {
    return this.sessionConnectionType;
  }

  get upstreamSessionId(): string | undefined {
    return this.upstreamSession;
  }

  isRegistered(): boolean {
    return this.registered;
  }

  /**
   * Snapshot of the conversation so far
   */
  getTranscript(): TranscriptEntry[] {
    return this.transcript.map((entry) => ({ ...entry }));
  }

  /**
   * Bind the client connection and claim a slot in the registry.
   * @throws ConnectionLimitExceededError when the registry is at capacity
   */
  attachDownstream(transport: DownstreamTransport, options: DownstreamOptions): void {
    if (this.relayState !== 'uninitialized') {
      throw new Error(`Cannot attach downstream in state ${this.relayState}`);
    }

    this.relayState = 'registering';
    this.downstream = transport;
    this.sessionConnectionType = options.connectionType;
    this.sessionCallerId = options.callerId;

    if (!this.registry.register(this.connectionId, options.callerId, options.connectionType)) {
      console.error(`[${this.connectionId}] Failed to register - connection limit reached`);
      this.relayState = 'rejected';
      throw new ConnectionLimitExceededError(this.connectionId);
    }

    this.registered = true;
    this.relayState = 'connecting';
    console.log(
      `[${this.connectionId}] Downstream attached: type=${options.connectionType}, caller=${options.callerId ?? 'unknown'}`
    );
  }

  /**
   * Open the upstream connection, configure the session and start both loops.
   * On failure the session is cleaned up and the error is rethrown.
   */
  async connect(): Promise<void> {
    if (this.relayState !== 'connecting') {
      throw new Error(`Cannot connect in state ${this.relayState}`);
    }

    try {
      const url = buildRealtimeUrl(this.config.endpoint, this.config.model, this.config.apiVersion);
      const headers = {
        'x-ms-client-request-id': randomUUID(),
        ...(await this.credentials.getAuthHeaders()),
      };

      const upstream = await this.connectUpstream(url, headers);
      this.upstream = upstream;
      if (this.cleanupPromise) {
        await upstream.close();
        throw new Error('Session closed while connecting');
      }
      console.log(
        `[${this.connectionId}] Connected to Voice Live (${this.credentials.name}) for caller ${this.sessionCallerId ?? 'unknown'}`
      );

      this.tools = this.createTools({
        emailProvider: this.emailProvider,
        resolveSessionId: () => this.upstreamSession ?? this.connectionId,
      });

      await upstream.send(JSON.stringify(buildSessionUpdate(this.tools, { voiceName: this.config.voiceName })));
      await upstream.send(JSON.stringify(responseCreate()));

      this.receiverLoop = this.runReceiver(upstream);
      this.senderLoop = this.runSender(upstream);
      if (!this.cleanupPromise) {
        this.relayState = 'streaming';
      }
    } catch (error) {
      console.error(`[${this.connectionId}] Failed to connect to Voice Live:`, error);
      // Closed stays terminal when the owner already tore the session down
      const closedByOwner = this.cleanupPromise !== null;
      await this.cleanup();
      if (!closedByOwner) {
        this.relayState = 'failed';
      }
      throw error;
    }
  }

  /**
   * Resolves once either loop has stopped (upstream closed, or a send failed).
   * The owner should call cleanup() after this.
   */
  async waitForUpstreamClose(): Promise<void> {
    const loops = [this.receiverLoop, this.senderLoop].filter((loop): loop is Promise<void> => loop !== null);
    if (loops.length > 0) {
      await Promise.race(loops);
    }
  }

  /**
   * Queue a message for the upstream connection. Ignored once the session is closing.
   */
  enqueue(message: UpstreamOutboundMessage): void {
    this.outbound.push(JSON.stringify(message));
  }

  /**
   * Queue caller audio, given as raw PCM bytes or an already base64-encoded payload
   */
  enqueueAudio(audio: Buffer | string): void {
    this.enqueue(inputAudioAppend(toBase64Audio(audio)));
  }

  /**
   * Raw PCM frame from a web client
   */
  handleWebAudio(audio: Buffer): void {
    this.enqueueAudio(audio);
  }

  /**
   * JSON media frame from a telephony client; silent frames are dropped
   */
  handleTelephonyFrame(frame: string): void {
    try {
      const audio = parseTelephonyAudio(frame);
      if (audio) {
        this.enqueueAudio(audio);
      }
    } catch (error) {
      console.error(`[${this.connectionId}] Error processing telephony frame:`, error);
    }
  }

  /**
   * Close the upstream connection, stop the sender loop and release the
   * registry slot. Safe to call more than once.
   */
  cleanup(): Promise<void> {
    if (!this.cleanupPromise) {
      this.cleanupPromise = this.teardown();
    }
    return this.cleanupPromise;
  }

  private async teardown(): Promise<void> {
    this.relayState = 'closing';

    if (this.upstream) {
      try {
        await this.upstream.close();
        console.log(`[${this.connectionId}] Voice Live connection closed`);
      } catch (error) {
        console.error(`[${this.connectionId}] Error closing Voice Live connection:`, error);
      }
    }

    this.outbound.cancel();
    if (this.senderLoop) {
      await this.senderLoop;
    }

    if (this.registered) {
      this.registry.unregister(this.connectionId);
      this.registered = false;
    }

    const durationSeconds = (Date.now() - this.startedAt.getTime()) / 1000;
    console.log(
      `[${this.connectionId}] Cleanup completed for caller ${this.sessionCallerId ?? 'unknown'} ` +
        `(duration=${durationSeconds.toFixed(2)}s, transcript=${this.transcript.length} entries)`
    );
    this.relayState = 'closed';
  }

  private async runSender(upstream: UpstreamTransport): Promise<void> {
    try {
      for await (const message of this.outbound) {
        await upstream.send(message);
      }
    } catch (error) {
      console.error(`[${this.connectionId}] Sender loop error:`, error);
      // Nothing drains the queue from here on
      this.outbound.cancel();
    }
  }

  private async runReceiver(upstream: UpstreamTransport): Promise<void> {
    try {
      for await (const raw of upstream) {
        await this.handleUpstreamMessage(raw);
      }
      console.log(`[${this.connectionId}] Receiver loop finished`);
    } catch (error) {
      console.error(`[${this.connectionId}] Receiver loop error:`, error);
    }
  }

  private async handleUpstreamMessage(raw: string): Promise<void> {
    let parsed: ParsedUpstreamMessage;
    try {
      parsed = parseUpstreamMessage(raw);
    } catch (error) {
      console.warn(`[${this.connectionId}] Dropping malformed upstream message:`, error);
      return;
    }

    if (parsed.kind === 'unrecognized') {
      console.debug(`[${this.connectionId}] Other event: ${parsed.type}`);
      return;
    }

    try {
      await this.handleUpstreamEvent(parsed.event);
    } catch (error) {
      console.error(`[${this.connectionId}] Error handling ${parsed.event.type}:`, error);
    }
  }

  private async handleUpstreamEvent(event: UpstreamEvent): Promise<void> {
    switch (event.type) {
      case 'session.created':
        this.upstreamSession = event.sessionId;
        console.log(`[${this.connectionId}] Session ID: ${event.sessionId ?? 'unknown'}`);
        return;

      case 'input_audio_buffer.cleared':
        console.log(`[${this.connectionId}] Input audio buffer cleared`);
        return;

      case 'input_audio_buffer.speech_started':
        console.log(`[${this.connectionId}] Voice activity detection started at ${event.audioStartMs ?? '?'} ms`);
        await this.sendEnvelope(stopAudioEnvelope());
        return;

      case 'input_audio_buffer.speech_stopped':
        console.log(`[${this.connectionId}] Speech stopped`);
        return;

      case 'conversation.item.input_audio_transcription.completed':
        console.log(`[${this.connectionId}] User: ${event.transcript}`);
        this.transcript.push({ role: 'user', content: event.transcript });
        return;

      case 'conversation.item.input_audio_transcription.failed':
        console.warn(`[${this.connectionId}] Transcription error: ${JSON.stringify(event.error)}`);
        return;

      case 'response.function_call_arguments.done':
        await this.dispatchFunctionCall(event);
        return;

      case 'response.done':
        console.log(`[${this.connectionId}] Response done: id=${event.responseId ?? 'unknown'}`);
        if (event.statusDetails) {
          console.log(`[${this.connectionId}] Status details: ${JSON.stringify(event.statusDetails, null, 2)}`);
        }
        return;

      case 'response.audio_transcript.done':
        console.log(`[${this.connectionId}] AI: ${event.transcript}`);
        this.transcript.push({ role: 'assistant', content: event.transcript });
        await this.sendEnvelope(transcriptionEnvelope(event.transcript));
        return;

      case 'response.audio.delta':
        if (this.sessionConnectionType === 'web') {
          await this.sendToDownstream(decodeAudio(event.delta));
        } else {
          await this.sendEnvelope(audioDataEnvelope(event.delta));
        }
        return;

      case 'error':
        console.error(`[${this.connectionId}] Voice Live error: ${JSON.stringify(event.error)}`);
        return;

      default: {
        const unhandled: never = event;
        console.debug(`[${this.connectionId}] Unhandled event: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  /**
   * Answer a function call. The output and the follow-up response trigger are
   * queued in one synchronous step so nothing can be interleaved between them.
   */
  private async dispatchFunctionCall(event: FunctionCallArgumentsDoneEvent): Promise<void> {
    const { callId, name } = event;
    console.log(`[${this.connectionId}] Function call received: ${name} (call_id=${callId ?? 'none'})`);

    if (!callId) {
      console.error(`[${this.connectionId}] Function call ${name} has no call_id; cannot reply`);
      return;
    }

    const result = await this.runTool(name, event.arguments);
    this.outbound.push(JSON.stringify(functionCallOutput(callId, result)));
    this.outbound.push(JSON.stringify(responseCreate()));
  }

  private async runTool(name: string, rawArguments: unknown): Promise<ToolResult> {
    const tools = this.tools;
    if (!tools || !tools.get(name)) {
      console.error(`[${this.connectionId}] Tool not found: ${name}`);
      return { success: false, message: `Tool not found: ${name}` };
    }

    let args: ToolArguments;
    try {
      args = decodeToolArguments(name, rawArguments);
    } catch (error) {
      console.error(`[${this.connectionId}] ${error instanceof Error ? error.message : String(error)}`);
      return { success: false, message: `Invalid arguments for tool: ${name}` };
    }

    try {
      const result = await tools.execute(name, args);
      console.log(`[${this.connectionId}] Tool ${name} executed successfully`);
      return result;
    } catch (error) {
      if (error instanceof ToolNotFoundError) {
        console.error(`[${this.connectionId}] Tool not found: ${name}`);
        return { success: false, message: `Tool not found: ${name}` };
      }
      console.error(`[${this.connectionId}] Tool ${name} failed:`, error);
      return { success: false, message: `Tool ${name} failed to complete the request` };
    }
  }

  private sendEnvelope(envelope: DownstreamEnvelope): Promise<void> {
    return this.sendToDownstream(JSON.stringify(envelope));
  }

  private async sendToDownstream(data: string | Buffer): Promise<void> {
    if (!this.downstream) return;
    try {
      await this.downstream.send(data);
    } catch (error) {
      console.error(`[${this.connectionId}] Failed to send to client:`, error);
    }
  }
}
