import { Resend } from 'resend'

export interface ClaimCodeEmail {
  to: string
  code: string
  listingName: string
  expiresInMinutes: number
}

/** The verification email could not be handed to the provider. */
export class EmailDeliveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'EmailDeliveryError'
  }
}

export interface ClaimMailer {
  sendClaimCode(message: ClaimCodeEmail): Promise<void>
}

function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
}

export function buildClaimCodeHtml({ code, listingName, expiresInMinutes }: ClaimCodeEmail, siteUrl: string): string {
  return `
<!DOCTYPE html>
<html><body style="font-family:-apple-system,BlinkMacSystemFont,'Segoe UI',Roboto,sans-serif;color:#111827;max-width:600px;margin:0 auto;padding:20px">
  <div style="background:#eff6ff;border-radius:12px;padding:20px;margin-bottom:24px">
    <h1 style="margin:0 0 4px;font-size:20px;color:#1d4ed8">Your verification code</h1>
    <p style="margin:0;color:#6b7280;font-size:14px">${escapeHtml(listingName)}</p>
  </div>

  <p style="font-size:15px;line-height:1.6;color:#374151">
    Enter this code to finish claiming your listing. It expires in ${expiresInMinutes} minutes.
  </p>

  <div style="text-align:center;margin:32px 0">
    <span style="display:inline-block;background:#1d4ed8;color:#ffffff;padding:14px 32px;border-radius:8px;font-weight:700;font-size:28px;letter-spacing:6px">
      ${code}
    </span>
  </div>

  <p style="font-size:13px;color:#9ca3af;border-top:1px solid #e5e7eb;padding-top:16px;margin-top:32px">
    If you didn't request this, you can ignore this email.<br>
    ${escapeHtml(siteUrl)}
  </p>
</body></html>`.trim()
}

export function buildClaimCodeText({ code, listingName, expiresInMinutes }: ClaimCodeEmail): string {
  return `Your verification code for ${listingName} is ${code}\n\nIt expires in ${expiresInMinutes} minutes.`
}

export function createResendMailer(opts: { apiKey: string; from: string; siteUrl: string }): ClaimMailer {
  const resend = new Resend(opts.apiKey)

  return {
    async sendClaimCode(message) {
      let result: Awaited<ReturnType<typeof resend.emails.send>>
      try {
        result = await resend.emails.send({
          from: opts.from,
          to: [message.to],
          subject: `Your verification code for ${message.listingName}`,
          html: buildClaimCodeHtml(message, opts.siteUrl),
          text: buildClaimCodeText(message),
        })
      } catch (err) {
        console.error('[email] Claim code send error:', err)
        throw new EmailDeliveryError('Email send failed', { cause: err })
      }

      if (result.error) {
        console.error('[email] Claim code send error:', result.error)
        throw new EmailDeliveryError(`Email send failed: ${result.error.message}`)
      }
    },
  }
}
