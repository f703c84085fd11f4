export interface MediaProbePort {
  /** Duration in seconds, or undefined when the container cannot be read. */
  probeDuration(filePath: string): Promise<number | undefined>;
}
