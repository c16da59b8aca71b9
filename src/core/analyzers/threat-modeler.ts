/**
 * Threat Modeler
 *
 * Maps line-level evidence patterns and the shape of the decision set to
 * STRIDE findings with a CVSS-like severity.
 *
 * escalate = severity >= 9.0, or information disclosure backed by
 * credential evidence.
 */

import { StrideCategory, ThreatFinding } from '../../types.js';
import type { AnalyzerInput, FailureFlag } from './index.js';
import { LineRule, formatSequenceId, locationOf, scanLines } from './line-scan.js';

export interface ThreatModelArtifact extends FailureFlag {
  threats: ThreatFinding[];
}

export const CRITICAL_SEVERITY = 9.0;

interface ThreatRule extends LineRule {
  title: string;
  strideCategory: StrideCategory;
  severity: number;
  description: string;
  mitigation: string;
  credential?: boolean;
}

const PLACEHOLDER = /\$\{|\{\{|<[a-z_-]+>|process\.env|os\.environ|getenv/i;

const CREDENTIAL_ASSIGNMENT =
  /\b(?:password|passwd|pwd|secret|api[_-]?key|access[_-]?key|auth[_-]?token|client[_-]?secret|private[_-]?key)\w*['"]?\s*[:=]\s*['"][^'"\s]{4,}['"]/;

// Provider token formats, recognisable whatever they are assigned to
const TOKEN_FORMAT =
  /\b(?:gh[pousr]_[A-Za-z0-9]{36}|github_pat_[A-Za-z0-9_]{22,}|AKIA[0-9A-Z]{16}|sk-(?:proj-)?[A-Za-z0-9_-]{20,}|xox[abprs]-[A-Za-z0-9-]{10,})/;

const THREAT_RULES: ThreatRule[] = [
  {
    id: 'jwt-verification-disabled',
    pattern: /algorithms?['"]?\s*[:=]\s*\[?\s*['"]none['"]|verify_signature['"]?\s*:\s*false|ignoreExpiration\s*:\s*true|\.decode\([^)]*verify\s*=\s*False/i,
    title: 'Token signature verification disabled',
    strideCategory: 'spoofing',
    severity: 9.1,
    description: 'Tokens are accepted without verifying their signature or expiry, so any caller can forge an identity.',
    mitigation: 'Always verify token signatures against a pinned algorithm list and enforce expiry.',
  },
  {
    id: 'tls-verification-disabled',
    pattern: /rejectUnauthorized\s*:\s*false|NODE_TLS_REJECT_UNAUTHORIZED\s*=\s*['"]?0|InsecureSkipVerify\s*:\s*true|verify\s*=\s*False/i,
    title: 'TLS certificate verification disabled',
    strideCategory: 'tampering',
    severity: 7.4,
    description: 'Outbound TLS connections skip certificate validation, allowing traffic to be intercepted and altered.',
    mitigation: 'Enable certificate verification; trust private CAs explicitly instead of disabling checks.',
  },
  {
    id: 'hardcoded-credential',
    pattern: new RegExp(`${CREDENTIAL_ASSIGNMENT.source}|${TOKEN_FORMAT.source}`, 'i'),
    unless: PLACEHOLDER,
    title: 'Hardcoded credential',
    strideCategory: 'information-disclosure',
    severity: 7.5,
    description: 'A credential-like value is committed in plain text and readable by anyone with access to the repository.',
    mitigation: 'Move the value to a secret store or environment variable and rotate the exposed credential.',
    credential: true,
  },
  {
    id: 'credential-in-url',
    pattern: /\b[a-z][a-z0-9+.-]*:\/\/[^\s:@/'"]+:[^\s@/'"]+@/i,
    unless: PLACEHOLDER,
    title: 'Credential embedded in connection string',
    strideCategory: 'information-disclosure',
    severity: 7.5,
    description: 'A connection string carries a username and password in plain text.',
    mitigation: 'Build connection strings from secrets injected at runtime.',
    credential: true,
  },
  {
    id: 'private-key',
    pattern: /-----BEGIN (?:RSA |EC |DSA |OPENSSH )?PRIVATE KEY-----/,
    title: 'Private key committed',
    strideCategory: 'information-disclosure',
    severity: 9.3,
    description: 'A private key is stored in the repository.',
    mitigation: 'Remove the key from history, revoke it and load keys from a secret store.',
    credential: true,
  },
  {
    id: 'plaintext-storage',
    pattern: /sslmode\s*=\s*disable|\b(?:ssl|tls|encrypt(?:ed|ion)?)['"]?\s*[:=]\s*false\b|storage_encrypted\s*=\s*false/i,
    title: 'Data stored or transmitted unencrypted',
    strideCategory: 'information-disclosure',
    severity: 6.5,
    description: 'Encryption is explicitly disabled for a data store or its connection.',
    mitigation: 'Enable encryption at rest and in transit for every data store.',
  },
  {
    id: 'bind-all-interfaces',
    pattern: /\b0\.0\.0\.0\b/,
    title: 'Service bound to all interfaces',
    strideCategory: 'elevation-of-privilege',
    severity: 5.3,
    description: 'A service listens on every network interface, exposing internal endpoints beyond their intended network.',
    mitigation: 'Bind to the interfaces the service must serve and restrict access at the network layer.',
  },
  {
    id: 'cors-wildcard',
    pattern: /Access-Control-Allow-Origin['"]?\s*[:,]\s*['"]\*['"]|\borigins?['"]?\s*[:=]\s*\[?\s*['"]\*['"]|CORS_ORIGIN_ALLOW_ALL\s*=\s*True/i,
    title: 'CORS allows any origin',
    strideCategory: 'information-disclosure',
    severity: 5.4,
    description: 'Any website can issue cross-origin requests and read the responses.',
    mitigation: 'Restrict allowed origins to known front ends.',
  },
  {
    id: 'debug-mode',
    pattern: /\bDEBUG['"]?\s*[:=]\s*(?:true|True|1)\b|\.run\([^)]*debug\s*=\s*True/,
    title: 'Debug mode enabled',
    strideCategory: 'information-disclosure',
    severity: 5.0,
    description: 'Debug mode exposes stack traces and internal state to clients.',
    mitigation: 'Disable debug mode outside local development.',
  },
  {
    id: 'dynamic-eval',
    pattern: /\beval\s*\(|\bnew Function\s*\(|\bexec\s*\(\s*(?:req|request|input|params|body)/,
    title: 'Dynamic code evaluation',
    strideCategory: 'elevation-of-privilege',
    severity: 8.8,
    description: 'Strings are evaluated as code; if any part comes from input, an attacker can run arbitrary code.',
    mitigation: 'Replace dynamic evaluation with explicit parsing or dispatch tables.',
  },
];

const RATE_LIMIT_MARKER: LineRule = {
  id: 'rate-limit',
  pattern: /rate[-_ ]?limit|throttl/i,
};

export function shouldEscalate(finding: Pick<ThreatFinding, 'severity' | 'strideCategory'>, credential: boolean): boolean {
  return (
    finding.severity >= CRITICAL_SEVERITY ||
    (finding.strideCategory === 'information-disclosure' && credential)
  );
}

export function isCriticalThreat(finding: ThreatFinding): boolean {
  return finding.severity >= CRITICAL_SEVERITY;
}

export function modelThreats(input: AnalyzerInput): ThreatModelArtifact {
  const hits = scanLines(input.inventory, input.reader, ['source', 'config', 'infrastructure'], [
    ...THREAT_RULES,
    RATE_LIMIT_MARKER,
  ]);

  const drafts: Omit<ThreatFinding, 'id'>[] = [];

  for (const rule of THREAT_RULES) {
    const ruleHits = hits.filter((h) => h.rule.id === rule.id);
    if (ruleHits.length === 0) continue;

    drafts.push({
      title: rule.title,
      strideCategory: rule.strideCategory,
      severity: rule.severity,
      description: rule.description,
      mitigation: rule.mitigation,
      evidenceRefs: ruleHits.map(locationOf),
      escalate: shouldEscalate(rule, rule.credential === true),
    });
  }

  drafts.push(...decisionThreats(input, hits.some((h) => h.rule.id === RATE_LIMIT_MARKER.id)));

  return {
    threats: drafts.map((draft, i) => ({ id: formatSequenceId('TM', i + 1), ...draft })),
  };
}

/**
 * Threats implied by what the decision set contains or lacks
 */
function decisionThreats(input: AnalyzerInput, hasRateLimiting: boolean): Omit<ThreatFinding, 'id'>[] {
  const records = input.decisions.map((d) => d.record).filter((r) => r.status !== 'REMOVED');
  const apis = records.filter((r) => r.category === 'framework' || r.category === 'api-style');
  if (apis.length === 0) {
    return [];
  }

  const refs = [...new Set(apis.flatMap((r) => r.evidenceRefs))].sort();
  const names = apis.map((r) => r.technologyName).join(', ');
  const threats: Omit<ThreatFinding, 'id'>[] = [];

  if (!records.some((r) => r.category === 'auth')) {
    const spoofing = { strideCategory: 'spoofing' as const, severity: 7.3 };
    threats.push({
      title: 'API without detected authentication',
      ...spoofing,
      description: `${names} expose endpoints but no authentication technology was detected.`,
      mitigation: 'Put an authentication layer in front of every non-public endpoint.',
      evidenceRefs: refs,
      escalate: shouldEscalate(spoofing, false),
    });
  }

  if (!hasRateLimiting) {
    const dos = { strideCategory: 'denial-of-service' as const, severity: 5.3 };
    threats.push({
      title: 'No rate limiting detected',
      ...dos,
      description: `No rate limiting or throttling was found for the endpoints served by ${names}.`,
      mitigation: 'Add rate limiting at the gateway or in the framework middleware.',
      evidenceRefs: refs,
      escalate: shouldEscalate(dos, false),
    });
  }

  return threats;
}
