export const PIN_MIN_LENGTH = 4;
export const PIN_MAX_LENGTH = 20;
export const ACCESS_CODE_MAX_LENGTH = 200;

export type PinCheck = { ok: true; value: string } | { ok: false; error: string };

function checkLength(raw: string, label: string, max: number): PinCheck {
  const value = raw.trim();
  if (value.length < PIN_MIN_LENGTH) {
    return { ok: false, error: `${label} must be at least ${PIN_MIN_LENGTH} characters` };
  }
  if (value.length > max) {
    return { ok: false, error: `${label} must be at most ${max} characters` };
  }
  return { ok: true, value };
}

/** Master, user and temporary pins. */
export function checkPin(raw: string, label = 'Pin'): PinCheck {
  return checkLength(raw, label, PIN_MAX_LENGTH);
}

export function checkAccessCodeSecret(raw: string): PinCheck {
  return checkLength(raw, 'Code', ACCESS_CODE_MAX_LENGTH);
}

/**
 * A PIN typed at an access point may be any credential secret, so it takes the
 * widest limit. Blank input counts as "no pin".
 */
export function checkSubmittedPin(raw: string | null | undefined): PinCheck | null {
  if (raw === null || raw === undefined || raw.trim() === '') return null;
  return checkLength(raw, 'Pin', ACCESS_CODE_MAX_LENGTH);
}
