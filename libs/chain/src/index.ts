export * from './chain';
export * from './chain.error';
export * from './caller';
export * from './contract';
export * from './interfaces';
export * from './standards';
export * from './tokens/erc20';
export * from './tokens/erc721';
export * from './tokens/erc1155';
export * from './tokens/royalty';
