import type { VoiceProfile } from '../../types';

/**
 * Maps a speaker identifier to its voice and speaking rate. Lookups are
 * case-insensitive; unknown speakers get the fallback profile.
 */
export class VoiceProfileResolver {
  private readonly table: ReadonlyMap<string, VoiceProfile>;

  constructor(
    profiles: Readonly<Record<string, VoiceProfile>>,
    private readonly fallback: VoiceProfile
  ) {
    this.table = new Map(
      Object.entries(profiles).map(([speaker, profile]) => [speaker.trim().toUpperCase(), profile])
    );
  }

  resolve(speaker: string): VoiceProfile {
    const profile = this.table.get(speaker.trim().toUpperCase()) ?? this.fallback;
    return { ...profile };
  }
}
