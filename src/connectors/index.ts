export * from './VenueConnector';
export * from './venues/GatewayVenueConnector';
export * from './venues/DydxConnector';
export * from './venues/HyperliquidConnector';
export * from './venues/PaperVenueConnector';
export * from './venues/SyntheticBookFeed';
