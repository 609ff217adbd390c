export {
  renderVerificationEmail,
  renderVerificationSubject,
  renderVerificationText,
  type VerificationEmailData,
} from './verification.js';
