import type { SceneJob } from "../types/index.js";

export const CHARACTER_TYPES = [ "billgates", "joker" ] as const;

export type CharacterType = typeof CHARACTER_TYPES[ number ];

export interface CharacterProfile {
  type: CharacterType;
  /** Short name used in page titles, e.g. "Jokers". */
  title: string;
  heading: string;
  tagline: string;
  emoji: string;
  scenes: readonly SceneJob[];
  /**
   * Whether the character has a look-alike variant. Only these characters
   * offer the exact-identity checkbox and fall back to the look-alike prompt.
   */
  hasLookAlike: boolean;
}

const defineScenes = (scenes: SceneJob[]): readonly SceneJob[] =>
  Object.freeze(scenes.map((scene) => Object.freeze({ ...scene })));

const BILLGATES_SCENES = defineScenes([
  {
    label: "Gyeongbokgung Palace",
    description: "at Gyeongbokgung Palace (Geunjeongjeon), early morning soft light, traditional palace architecture in background",
  },
  {
    label: "Myeongdong street cafe",
    description: "at a trendy cafe in Myeongdong street, casual friendly atmosphere, standing close together with arms around each other's shoulders in a warm friendly pose",
  },
  {
    label: "Hangang Park bench",
    description: "at Hangang Park on a bench, afternoon golden hour lighting, relaxed casual setting with Seoul skyline in background",
  },
  {
    label: "N Seoul Tower observatory",
    description: "at N Seoul Tower observatory, sunset skyline view of Seoul",
  },
]);

const JOKER_SCENES = defineScenes([
  {
    label: "Gotham City street",
    description: "on a Gotham City street at night, dramatic urban lighting, dark atmospheric setting",
  },
  {
    label: "Old arcade",
    description: "in an old arcade, neon lights and vintage game machines in background, moody atmosphere",
  },
  {
    label: "Theater stairs",
    description: "on iconic concrete stairs, dramatic lighting, urban decay background",
  },
  {
    label: "Wayne Theater",
    description: "in front of Wayne Theater, classic Gotham architecture, evening atmosphere",
  },
]);

const CHARACTER_PROFILES: Record<CharacterType, CharacterProfile> = {
  billgates: {
    type: "billgates",
    title: "Bill Gates",
    heading: "Bill Gates + You in Korea",
    tagline: "Upload a selfie and get photos that look like you toured Korea's landmarks with Bill Gates.",
    emoji: "👔",
    scenes: BILLGATES_SCENES,
    hasLookAlike: true,
  },
  joker: {
    type: "joker",
    title: "Jokers",
    heading: "Jokers + You in Gotham",
    tagline: "Upload a selfie and get photos of you arm in arm between two Jokers.",
    emoji: "🃏",
    scenes: JOKER_SCENES,
    hasLookAlike: false,
  },
};

export function getCharacterProfile(type: CharacterType): CharacterProfile {
  return CHARACTER_PROFILES[ type ];
}

export function listCharacterProfiles(): CharacterProfile[] {
  return CHARACTER_TYPES.map((type) => CHARACTER_PROFILES[ type ]);
}
