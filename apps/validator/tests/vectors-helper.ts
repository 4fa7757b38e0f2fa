/** RFC 4034 section 5.4: DNSKEY of dskey.example.com., key tag 60485 */
export const RFC4034_KEY = {
  flags: 256,
  protocol: 3,
  algorithm: 5,
  publicKey: Buffer.from(
    'AQOeiiR0GOMYkDshWoSKz9XzfwJr1AYtsmx3TGkJaNXVbfi/2pHm822aJ5iI9BMzNXxeYCmZDRD99WYwYqUSdjMmmAphXdvxegXd/M5+X7OrzKBaMbCVdFLUUh6DhweJBjEVv5f2wwjM9XzcnOf+EPbtG9DMBmADjFDc2w/rljwvFw==',
    'base64',
  ),
};

/** SHA-1 DS digest published for RFC4034_KEY */
export const RFC4034_DS_SHA1 = '2bb183af5f22588179a53b0a98631fad1a292118';

/** IANA root zone KSK-2017, key tag 20326 */
export const ROOT_KSK_2017 = {
  flags: 257,
  protocol: 3,
  algorithm: 8,
  publicKey: Buffer.from(
    'AwEAAaz/tAm8yTn4Mfeh5eyI96WSVexTBAvkMgJzkKTOiW1vkIbzxeF3+/4RgWOq7HrxRixHlFlExOLAJr5emLvN7SWXgnLh4+B5xQlNVz8Og8kvArMtNROxVQuCaSnIDdD5LKyWbRd2n9WGe2R8PzgCmr3EgVLrjyBxWezF0jLHwVN8efS3rCj/EWgvIWgb9tarpVUDK/b58Da+sqqls3eNbuv7pr+eoZG+SrDK6nWeL3c6H5Apxz7LjVc1uTIdsIXxuOLYA4/ilBmSVIzuDWfdRUfhHdY6+cn8HFRm+2hM8AnXGXws9555KrUB5qihylGa8subX2Nn6UwNR1AkUTV74bU=',
    'base64',
  ),
};

/** SHA-256 DS digest of ROOT_KSK_2017 as published by IANA */
export const ROOT_KSK_2017_DS_SHA256 = 'e06d44b80b8f1d39a95c0b0d7c65d08458e880409bbc683457104237c7f8ec8d';
