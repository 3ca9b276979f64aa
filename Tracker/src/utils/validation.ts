import Joi from 'joi';

export interface IPeerRegistration {
  peerId: string;
  ip: string;
  port: number;
}

const peerIdSchema = Joi.string().max(64).required().label('peer_id');

const peerRegistrationSchema = Joi.object<IPeerRegistration>({
  peerId: peerIdSchema,
  ip: Joi.alternatives()
    .try(Joi.string().ip({ cidr: 'forbidden' }), Joi.string().hostname())
    .required()
    .label('ip')
    .messages({ 'alternatives.match': '"ip" must be a valid IP address or hostname' }),
  port: Joi.number().integer().min(1).max(65535).required().label('port'),
});

/**
 * Validates the arguments of a REGISTER command.
 * The port arrives as text and is converted to a number.
 */
export const validatePeerRegistration = (data: { peerId: string; ip: string; port: string }) => {
  return peerRegistrationSchema.validate(data, { convert: true });
};

/**
 * Validates the single argument of UNREGISTER and HEARTBEAT.
 */
export const validatePeerId = (peerId: string) => {
  return peerIdSchema.validate(peerId);
};
