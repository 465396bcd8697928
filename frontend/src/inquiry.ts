import { MESSAGES } from "./config";
import type { Facility } from "./types";

export interface InquiryForm {
  name: string;
  organisation?: string;
  email: string;
  telefon?: string;
  nachricht: string;
  /** Age of the young person the inquiry is about. */
  alter?: number | null;
}

export interface Inquiry {
  facility: Facility;
  form: InquiryForm;
  submittedAt: Date;
}

export type InquiryResult = { ok: true; message: string } | { ok: false; error: string };

/** Delivers an inquiry to the facility. Swap in a mail or webhook sender for production. */
export interface NotificationSender {
  send(inquiry: Inquiry): Promise<void>;
}

/** Accepts every inquiry without dispatching anything. */
export class AcknowledgingSender implements NotificationSender {
  async send(inquiry: Inquiry): Promise<void> {
    console.info(
      `Inquiry for facility #${inquiry.facility.id} from ${inquiry.form.email} acknowledged (not dispatched)`,
    );
  }
}

const REQUIRED_FIELDS = ["name", "email", "nachricht"] as const;

export type RequiredInquiryField = (typeof REQUIRED_FIELDS)[number];

export function validateInquiry(form: InquiryForm): RequiredInquiryField[] {
  return REQUIRED_FIELDS.filter((field) => form[field].trim().length === 0);
}

export function confirmationMessage(facility: Facility, form: InquiryForm): string {
  return (
    `Vielen Dank, ${form.name.trim()}! Ihre Anfrage an ${facility.name} wurde erfolgreich gesendet. ` +
    `Sie erhalten eine Bestätigung an ${form.email.trim()}.`
  );
}

export async function submitInquiry(
  facility: Facility | undefined,
  form: InquiryForm,
  sender: NotificationSender,
  now: () => Date = () => new Date(),
): Promise<InquiryResult> {
  if (!facility) return { ok: false, error: MESSAGES.notFound };
  if (validateInquiry(form).length > 0) return { ok: false, error: MESSAGES.requiredFields };

  try {
    await sender.send({ facility, form, submittedAt: now() });
  } catch (err: unknown) {
    console.error(`Sending inquiry for facility #${facility.id} failed:`, err);
    return { ok: false, error: MESSAGES.sendFailed };
  }
  return { ok: true, message: confirmationMessage(facility, form) };
}
