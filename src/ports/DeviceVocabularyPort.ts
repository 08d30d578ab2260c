/** Source of the device vocabulary in its wire form, validated by the caller. */
export interface DeviceVocabularyPort {
  readonly name: string;
  loadSnapshot(): Promise<unknown>;
}
