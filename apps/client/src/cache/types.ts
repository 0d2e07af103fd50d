import type {
    ApiConversationSummary,
    ApiMessage,
    DeliveryState,
    MessageRole,
    PersistedConversationSummary,
    PersistedMessage,
} from '@chatsync/protocol';

export type ConversationSummary = {
    id: string;
    title?: string;
    lastMessage?: string;
    /** Epoch seconds. */
    createdAt: number;
    updatedAt?: number;
    messageCount: number;
};

export type Message = {
    /** Empty until the server assigns one. */
    id: string;
    role: MessageRole;
    content: string;
    createdAt: number;
    deliveryState?: DeliveryState;
};

/** The single ordering key for conversation recency. */
export function effectiveTimestamp(summary: Pick<ConversationSummary, 'createdAt' | 'updatedAt'>): number {
    return summary.updatedAt ?? summary.createdAt;
}

export function summaryFromRecord(record: PersistedConversationSummary | ApiConversationSummary): ConversationSummary {
    return {
        id: record.id,
        ...(record.title != null ? { title: record.title } : {}),
        ...(record.last_message != null ? { lastMessage: record.last_message } : {}),
        createdAt: record.created_at,
        ...(record.updated_at != null ? { updatedAt: record.updated_at } : {}),
        messageCount: Math.max(0, record.message_count ?? 0),
    };
}

export function summaryToRecord(summary: ConversationSummary): PersistedConversationSummary {
    return {
        id: summary.id,
        title: summary.title ?? null,
        last_message: summary.lastMessage ?? null,
        created_at: summary.createdAt,
        updated_at: summary.updatedAt ?? null,
        message_count: summary.messageCount,
    };
}

export function messageFromRecord(record: PersistedMessage | ApiMessage): Message {
    const deliveryState = 'delivery_state' in record ? record.delivery_state : undefined;
    return {
        id: record.id,
        role: record.role,
        content: record.content,
        createdAt: record.created_at,
        ...(deliveryState ? { deliveryState } : {}),
    };
}

export function messageToRecord(message: Message): PersistedMessage {
    return {
        id: message.id,
        role: message.role,
        content: message.content,
        created_at: message.createdAt,
        ...(message.deliveryState ? { delivery_state: message.deliveryState } : {}),
    };
}
