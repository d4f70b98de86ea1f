/**
 * Runtime Message Bus
 * In-memory pub/sub for task, agent and approval notifications.
 * Messages are addressed to an agent id, or '*' for broadcast.
 */

import { EventEmitter } from 'events';
import { nanoid } from 'nanoid';

export interface BusMessage {
  id: string;
  from: string;      // Originating agent or subsystem
  to: string;        // Target agent id or '*' for broadcast
  type: MessageType;
  payload: Record<string, unknown>;
  timestamp: number;
}

export type MessageType =
  | 'agent.status'       // Agent process changed state
  | 'task.delegated'     // Task created for a target agent
  | 'task.queued'        // Task released from approval into the queue
  | 'task.started'       // Target picked the task up
  | 'task.completed'
  | 'task.failed'
  | 'task.cancelled'
  | 'approval.requested'
  | 'approval.decided'
  | 'system.kill';       // Kill switch fired

export type MessageHandler = (message: BusMessage) => void;

export interface MessageFilter {
  from?: string;
  to?: string;
  type?: MessageType;
}

export class MessageBus {
  private emitter = new EventEmitter();
  private history: BusMessage[] = [];
  private maxHistory: number;

  constructor(maxHistory = 1000) {
    this.maxHistory = maxHistory;
    this.emitter.setMaxListeners(50);
  }

  /**
   * Publish a message to a specific agent or broadcast
   */
  send(message: Omit<BusMessage, 'id' | 'timestamp'>): BusMessage {
    const fullMessage: BusMessage = {
      ...message,
      id: nanoid(),
      timestamp: Date.now(),
    };

    this.history.push(fullMessage);
    if (this.history.length > this.maxHistory) {
      this.history = this.history.slice(-this.maxHistory);
    }

    this.emitter.emit(`agent:${message.to}`, fullMessage);
    this.emitter.emit(`type:${message.type}`, fullMessage);

    // Broadcasts already reached 'agent:*' above
    if (message.to !== '*') {
      this.emitter.emit('agent:*', fullMessage);
    }
    return fullMessage;
  }

  /**
   * Subscribe to messages addressed to one agent
   */
  subscribe(agentId: string, handler: MessageHandler): () => void {
    this.emitter.on(`agent:${agentId}`, handler);
    return () => {
      this.emitter.off(`agent:${agentId}`, handler);
    };
  }

  /**
   * Subscribe to one message type regardless of target
   */
  subscribeType(type: MessageType, handler: MessageHandler): () => void {
    this.emitter.on(`type:${type}`, handler);
    return () => {
      this.emitter.off(`type:${type}`, handler);
    };
  }

  /**
   * Subscribe to every message
   */
  subscribeAll(handler: MessageHandler): () => void {
    this.emitter.on('agent:*', handler);
    return () => {
      this.emitter.off('agent:*', handler);
    };
  }

  getHistory(filter?: MessageFilter): BusMessage[] {
    return this.history.filter(msg => {
      if (filter?.from && msg.from !== filter.from) return false;
      if (filter?.to && msg.to !== filter.to) return false;
      if (filter?.type && msg.type !== filter.type) return false;
      return true;
    });
  }

  clearHistory(): void {
    this.history = [];
  }

  destroy(): void {
    this.emitter.removeAllListeners();
    this.history = [];
  }
}
