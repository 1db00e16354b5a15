export interface Metadata {
  title: string;
  artist: string;
  album: string;
  albumArtist: string;
  date: string;
  trackNumber: number;
  totalTracks: number;
  discNumber: number;
  isrc: string;
  description: string;
  lyrics: string;
}

export interface AudioQuality {
  bitDepth: number;
  sampleRate: number;
}
