export { analyzeCertificate, calculateSecurityScore, gradeFor, EXPIRY_WARNING_DAYS } from './analyzer.js';
export { parseDistinguishedName, formatDistinguishedName } from './distinguished-name.js';
export { matchesCertificateName, hostnameMatches } from './hostname.js';
