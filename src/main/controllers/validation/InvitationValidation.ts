import { check } from 'express-validator';

const respond = [
  check('invitationId')
    .exists().withMessage('invitationId parameter is required')
    .isUUID().withMessage('invitationId must be a valid UUID'),
];

export { respond };
