// src/kernel/kernel.ts

/**
 * @file Kernel - Registry of providers and tools, and the dispatch point agents call into.
 *
 * Each provider is filed under the capability it declares. Dispatch always goes to the
 * first provider registered for a capability; there is no fallback to later ones.
 */

import { ITool, IToolDefinition } from '../core/tool';
import { NoProviderError } from '../core/errors';
import { ILogger, NoopLogger } from '../core/logger';
import { LLMMessage } from '../llm/types';
import { AgentDefaults, DEFAULT_AGENT_DEFAULTS } from '../agents/config';
import { FunctionToolOptions, ToolFunction } from '../tools/function-tool';
import { ToolRegistry } from '../tools/tool-registry';
import {
  GenerationOptions,
  MemorySearchResult,
  Metadata,
  Provider,
  ProviderByCapability,
  ProviderCapability,
} from '../providers/types';

export interface KernelOptions {
  providers?: Provider[];
  tools?: Array<ITool | ToolFunction>;
  logger?: ILogger;
  /** Generation options applied when a call leaves them unset. */
  generationDefaults?: GenerationOptions;
  /** Defaults read by agents built on this kernel. */
  agentDefaults?: Partial<AgentDefaults>;
}

export interface GenerateTextOptions extends GenerationOptions {
  /** Tool catalog for this call. Defaults to every registered tool; `[]` disables tools. */
  tools?: IToolDefinition[];
  /** Tools used to run the model's calls. Defaults to every registered tool. */
  toolImplementations?: ReadonlyMap<string, ITool>;
  messages?: LLMMessage[];
}

type ProviderLists = { [K in ProviderCapability]: Array<ProviderByCapability[K]> };

export class Kernel {
  private readonly providers: ProviderLists = { text: [], embedding: [], memory: [], storage: [] };
  private readonly tools: ToolRegistry;
  private readonly generationDefaults: GenerationOptions;
  public readonly logger: ILogger;
  public readonly agentDefaults: Readonly<AgentDefaults>;

  constructor(options: KernelOptions = {}) {
    this.logger = options.logger ?? new NoopLogger();
    this.tools = new ToolRegistry({ logger: this.logger });
    this.generationDefaults = { ...options.generationDefaults };
    this.agentDefaults = { ...DEFAULT_AGENT_DEFAULTS, ...options.agentDefaults };
    for (const provider of options.providers ?? []) {
      this.registerProvider(provider);
    }
    for (const tool of options.tools ?? []) {
      this.tools.register(tool);
    }
  }

  /**
   * Files the provider under its capability.
   * Returns false when the same instance is already registered or the capability is unknown.
   */
  public registerProvider(provider: Provider): boolean {
    switch (provider.capability) {
      case 'text':
        return this.addProvider(this.providers.text, provider);
      case 'embedding':
        return this.addProvider(this.providers.embedding, provider);
      case 'memory':
        return this.addProvider(this.providers.memory, provider);
      case 'storage':
        return this.addProvider(this.providers.storage, provider);
      default:
        this.logger.log('warn', 'Kernel', 'Ignoring provider with an unrecognized capability.');
        return false;
    }
  }

  private addProvider<T extends Provider>(list: T[], provider: T): boolean {
    if (list.includes(provider)) {
      this.logger.log('debug', 'Kernel', `Provider already registered as ${provider.capability}; skipped.`);
      return false;
    }
    list.push(provider);
    this.logger.log('info', 'Kernel', `Registered ${provider.capability} provider #${list.length}.`);
    return true;
  }

  /**
   * First registered provider of a capability, the one dispatch uses.
   */
  public getProvider<K extends ProviderCapability>(capability: K): ProviderByCapability[K] | undefined {
    const list: Array<ProviderByCapability[K]> = this.providers[capability];
    return list.length > 0 ? list[0] : undefined;
  }

  public getProviders<K extends ProviderCapability>(capability: K): ReadonlyArray<ProviderByCapability[K]> {
    const list: Array<ProviderByCapability[K]> = this.providers[capability];
    return [...list];
  }

  private requireProvider<K extends ProviderCapability>(capability: K): ProviderByCapability[K] {
    const provider = this.getProvider(capability);
    if (provider === undefined) {
      throw new NoProviderError(capability);
    }
    return provider;
  }

  public registerTool(toolOrFunction: ITool | ToolFunction, options?: FunctionToolOptions): ITool {
    return this.tools.register(toolOrFunction, options);
  }

  public getTool(name: string): ITool | undefined {
    return this.tools.get(name);
  }

  public get toolDefinitions(): IToolDefinition[] {
    return this.tools.definitions();
  }

  public get toolImplementations(): ReadonlyMap<string, ITool> {
    return this.tools.implementations();
  }

  /**
   * @throws NoProviderError when no text provider is registered.
   */
  public async generateText(prompt: string, options: GenerateTextOptions = {}): Promise<string> {
    const provider = this.requireProvider('text');
    const defaults = this.generationDefaults;
    return provider.generateText({
      prompt,
      systemMessage: options.systemMessage ?? defaults.systemMessage,
      context: options.context ?? defaults.context,
      temperature: options.temperature ?? defaults.temperature,
      maxTokens: options.maxTokens ?? defaults.maxTokens,
      topP: options.topP ?? defaults.topP,
      frequencyPenalty: options.frequencyPenalty ?? defaults.frequencyPenalty,
      presencePenalty: options.presencePenalty ?? defaults.presencePenalty,
      messages: options.messages,
      tools: options.tools ?? this.tools.definitions(),
      toolImplementations: options.toolImplementations ?? this.tools.implementations(),
    });
  }

  /**
   * @throws NoProviderError when no embedding provider is registered.
   */
  public async generateEmbedding(text: string): Promise<number[]> {
    return this.requireProvider('embedding').generateEmbedding(text);
  }

  public async addTextToMemory(text: string, metadata: Metadata = {}): Promise<string> {
    return this.requireProvider('memory').addText(text, metadata);
  }

  public async searchMemory(query: string, limit?: number): Promise<MemorySearchResult[]> {
    return this.requireProvider('memory').searchSimilar(query, limit);
  }

  /**
   * @throws ToolNotFoundError when the name is not registered.
   */
  public async executeTool(toolOrName: ITool | string, args: Record<string, unknown> = {}): Promise<unknown> {
    return this.tools.invoke(toolOrName, args);
  }

  public clearProviders(): void {
    this.providers.text.length = 0;
    this.providers.embedding.length = 0;
    this.providers.memory.length = 0;
    this.providers.storage.length = 0;
  }

  public clearTools(): void {
    this.tools.clear();
  }
}
