export interface ToneOptions {
  frequency: number;
  ms: number;
  volume?: number;
}

export interface AudioOutputPort {
  /** Prepares the playback backend. Rejects only when the backend fails to start. */
  activate(): Promise<void>;
  play(filePath: string): Promise<void>;
  prepareTone(name: string, options: ToneOptions): Promise<string>;
}
