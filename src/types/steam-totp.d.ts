declare module 'steam-totp' {
  const SteamTotp: {
    generateAuthCode: (sharedSecret: string | Buffer, timeOffset?: number) => string;
    getConfirmationKey: (identitySecret: string | Buffer, time: number, tag: string) => string;
  };

  export default SteamTotp;
}
