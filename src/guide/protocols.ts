export const EMERGENCY_TYPES = [
  "cardiac_arrest",
  "choking",
  "possible_stroke",
  "anaphylaxis",
  "unconscious_but_breathing",
] as const;

export type EmergencyType = (typeof EMERGENCY_TYPES)[number];

/** Type used when triage gives no usable classification. */
export const FALLBACK_EMERGENCY_TYPE: EmergencyType = "unconscious_but_breathing";

export type Protocol = {
  title: string;
  /** Ordered; display text carries the 1-based step number. */
  steps: readonly string[];
  notes: readonly string[];
  /** Descriptive only, never evaluated. */
  stopCondition: string;
};

export type ProtocolLookupResult =
  | { ok: true; emergencyType: EmergencyType; protocol: Protocol }
  | { ok: false; error: "not_found"; emergencyType: string; message: string };

function freezeProtocol(protocol: Protocol): Readonly<Protocol> {
  return Object.freeze({
    ...protocol,
    steps: Object.freeze([...protocol.steps]),
    notes: Object.freeze([...protocol.notes]),
  });
}

const PROTOCOLS: Readonly<Record<EmergencyType, Readonly<Protocol>>> = Object.freeze({
  cardiac_arrest: freezeProtocol({
    title: "Suspected Cardiac Arrest (Adult)",
    steps: [
      "1. Call emergency services right away, or have someone nearby call on speaker.",
      "2. Lay the person on their back on a firm, flat surface.",
      "3. Start chest compressions at 100 to 120 per minute.",
      "4. Push hard and fast in the center of the chest, letting it fully rise between pushes.",
      "5. If an AED is available, have someone bring it, switch it on and follow its voice prompts.",
    ],
    notes: [
      "If you are alone, call emergency services on speaker and start compressions while you talk.",
      "Keep compressing until you are exhausted, someone takes over, or a professional tells you to stop.",
    ],
    stopCondition: "Emergency responders arrive and take over.",
  }),
  choking: freezeProtocol({
    title: "Severe Choking (Adult)",
    steps: [
      "1. Ask the person if they are choking and whether they can speak or cough.",
      "2. If they cannot cough, speak or breathe, stand behind them and lean them slightly forward.",
      "3. Give firm abdominal thrusts, inward and upward above the navel, until the object comes out.",
      "4. If they become unresponsive, lower them gently to the ground and start CPR.",
    ],
    notes: [
      "If they can still cough or speak, encourage them to keep coughing.",
      "Do not sweep blindly inside their mouth with your fingers.",
    ],
    stopCondition: "The object comes out and breathing improves, or emergency services arrive.",
  }),
  possible_stroke: freezeProtocol({
    title: "Possible Stroke (FAST Check)",
    steps: [
      "1. FACE: ask them to smile. Does one side droop?",
      "2. ARMS: ask them to raise both arms. Does one drift down?",
      "3. SPEECH: ask them to repeat a short phrase. Is it slurred or strange?",
      "4. TIME: note the time the symptoms started.",
      "5. Call emergency services now and describe every symptom and when it began.",
    ],
    notes: [
      "Do not give them anything to eat or drink.",
      "Stay with them and keep watching their breathing and responsiveness.",
    ],
    stopCondition: "Emergency services arrive and take over.",
  }),
  anaphylaxis: freezeProtocol({
    title: "Suspected Anaphylaxis (Severe Allergic Reaction)",
    steps: [
      "1. Look for swelling of the lips or face, trouble breathing, hives or dizziness.",
      "2. If they have an epinephrine auto-injector, help them use it in the outer thigh.",
      "3. Call emergency services immediately.",
      "4. Have them lie down with legs raised if they feel faint, unless that makes breathing harder.",
      "5. If symptoms continue and a second auto-injector is available, it may be used after 5 to 15 minutes.",
    ],
    notes: [
      "Even if they improve after epinephrine, they still need medical evaluation.",
      "Do not let them stand or walk if they feel weak or dizzy.",
    ],
    stopCondition: "Emergency services arrive and take over.",
  }),
  unconscious_but_breathing: freezeProtocol({
    title: "Unconscious but Breathing (Recovery Position)",
    steps: [
      "1. Call emergency services and tell them the person is unresponsive but breathing.",
      "2. Check breathing: watch the chest rise, listen and feel for air at the nose and mouth.",
      "3. If breathing is normal, roll them onto their side into the recovery position.",
      "4. Tilt the head back slightly to keep the airway open.",
      "5. Keep re-checking their breathing until help arrives.",
    ],
    notes: [
      "If breathing stops or becomes abnormal at any point, start CPR.",
      "If a spinal injury is possible, move them as little and as carefully as you can.",
    ],
    stopCondition: "Emergency services arrive and take over.",
  }),
});

export function isEmergencyType(value: string): value is EmergencyType {
  return EMERGENCY_TYPES.some((type) => type === value);
}

/**
 * Look up the protocol for an emergency type. Unknown keys return a tagged
 * failure carrying the key; there is no substitution at this layer.
 */
export function lookupProtocol(emergencyType: string): ProtocolLookupResult {
  if (!isEmergencyType(emergencyType)) {
    return {
      ok: false,
      error: "not_found",
      emergencyType,
      message: `Unknown emergency_type: ${emergencyType}.`,
    };
  }
  return { ok: true, emergencyType, protocol: PROTOCOLS[emergencyType] };
}
