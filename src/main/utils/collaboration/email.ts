import type { CollaborationEmail, PairScore } from '../../types/models/Collaboration';
import { rationaleFor } from './scoring';

/**
 * Invitation email for a scored pair of labs. Goes to the labs' contact
 * addresses, or to `mailbox` when neither lab has one.
 */
export function generateCollaborationEmail(pair: PairScore, mailbox: string, generatedAt: Date): CollaborationEmail {
  const { labA, labB } = pair;
  const contacts = [labA.contactEmail, labB.contactEmail].filter(
    (email): email is string => typeof email === 'string' && email.length > 0
  );
  const to = contacts.length > 0 ? [...new Set(contacts)] : [mailbox];

  const reasons = rationaleFor(pair).map(reason => `- ${reason}`);
  const body = [
    'Hello,',
    '',
    'We identified a collaboration opportunity between:',
    `${labA.name} (${labA.focusArea || 'no focus area'})`,
    `${labB.name} (${labB.focusArea || 'no focus area'})`,
    '',
    `Collaboration score: ${pair.score}/100`,
    ...(reasons.length > 0 ? ['', 'Why these labs:', ...reasons] : []),
    '',
    'This collaboration could lead to shared research resources, joint publications and combined grant opportunities.',
    '',
    'Please let us know if you are interested.',
    '',
    'Regards,',
    'Research Collaboration Team',
  ].join('\n');

  return {
    to,
    subject: `Collaboration Opportunity: ${labA.name} ↔ ${labB.name}`,
    body,
    generatedAt: generatedAt.toISOString(),
  };
}
