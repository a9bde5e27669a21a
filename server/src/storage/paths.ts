export const joinStoragePath = (prefix: string, name: string): string => {
  const cleanPrefix = prefix.replace(/^\/+|\/+$/g, '');
  return cleanPrefix ? `${cleanPrefix}/${name}` : name;
};
