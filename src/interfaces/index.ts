export * from './carrier.interface';
export * from './integrity.interface';
export * from './pipeline.interface';
export * from './stegavox-config.interface';
export * from './stego-error.interface';
export * from './voice.interface';
