export * from './remote-ssh';
export * from './session';
