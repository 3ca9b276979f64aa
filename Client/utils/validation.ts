import Joi from 'joi';
import { IChatMessage } from '../Types/MessageTypes.js';
import { IPeerSummary, ITrackerReply } from '../Types/TrackerTypes.js';

const peerSummarySchema = Joi.object<IPeerSummary>({
    peer_id: Joi.string().required(),
    ip: Joi.string().required(),
    port: Joi.number().integer().min(1).max(65535).required(),
});

const trackerReplySchema = Joi.object<ITrackerReply>({
    status: Joi.string().valid('success', 'error').required(),
    message: Joi.string().allow('').when('status', { is: 'error', then: Joi.required() }),
    peer_count: Joi.number().integer().min(0),
    peers: Joi.array().items(peerSummarySchema),
}).unknown(true);

const chatMessageSchema = Joi.object<IChatMessage>({
    type: Joi.string().valid('direct', 'broadcast').required(),
    from: Joi.string().max(64).required(),
    content: Joi.string().allow('').required(),
});

/**
 * Validates a decoded tracker reply before the client trusts any field of it.
 */
export const validateTrackerReply = (data: unknown) => {
    return trackerReplySchema.validate(data);
};

/**
 * Validates a decoded peer-to-peer message.
 */
export const validateChatMessage = (data: unknown) => {
    return chatMessageSchema.validate(data, { stripUnknown: true });
};

export const peerIdSchema = Joi.string().max(64).pattern(/^\S+$/).label('peer id');
