export type MessageType = 'direct' | 'broadcast';

/**
 * The only payload exchanged between peers: one per connection.
 */
export interface IChatMessage {
    type: MessageType;
    from: string;
    content: string;
}

export interface IReceivedMessage extends IChatMessage {
    receivedAt: Date;
    remoteAddress: string;
}

export type MessageSink = (message: IReceivedMessage) => void;
