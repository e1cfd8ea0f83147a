/**
 * Development subcategories of the directory, in crawl order
 * Paths are resolved against the configured base URL
 */

export interface Subcategory {
  name: string;
  path: string;
}

export const DEVELOPMENT_SUBCATEGORIES: readonly Subcategory[] = [
  { name: 'Mobile Apps', path: '/directory/mobile-application-developers' },
  { name: 'iPhone Apps', path: '/directory/iphone-application-developers' },
  { name: 'Android Apps', path: '/directory/android-application-developers' },
  { name: 'Gaming Apps', path: '/directory/game-mobile-app-developers' },
  { name: 'Finance Apps', path: '/app-developers/financial' },
  { name: 'Software Developers', path: '/developers' },
  { name: 'Software Testing', path: '/developers/testing' },
  { name: 'Laravel', path: '/developers/laravel' },
  { name: 'Microsoft Sharepoint', path: '/it-services/microsoft-sharepoint' },
  { name: 'Webflow', path: '/developers/webflow' },
  { name: 'Web Developers', path: '/web-developers' },
  { name: 'Python & Django', path: '/developers/python-django' },
  { name: 'PHP', path: '/web-developers/php' },
  { name: 'Wordpress', path: '/developers/wordpress' },
  { name: 'Drupal', path: '/developers/drupal' },
  { name: 'Artificial Intelligence', path: '/developers/artificial-intelligence' },
  { name: 'Blockchain', path: '/developers/blockchain' },
  { name: 'AR/VR', path: '/developers/virtual-reality' },
  { name: 'IoT', path: '/developers/internet-of-things' },
  { name: 'React Native', path: '/developers/react-native' },
  { name: 'Flutter', path: '/developers/flutter' },
  { name: 'DOTNET', path: '/developers/dot-net' },
  { name: 'Ruby on Rails', path: '/developers/ruby-rails' },
  { name: 'JavaScript', path: '/web-developers/javascript' },
  { name: 'E-Commerce Developers', path: '/developers/ecommerce' },
  { name: 'Magento', path: '/developers/magento' },
  { name: 'Shopify', path: '/developers/shopify' },
  { name: 'BigCommerce', path: '/developers/bigcommerce' },
  { name: 'WooCommerce', path: '/developers/woocommerce' },
];

export function subcategoryUrl(subcategory: Subcategory, baseUrl: string): string {
  return new URL(subcategory.path, baseUrl).href;
}

/**
 * Pick the categories to crawl
 * Names match case-insensitively; no targets means every category.
 * Skipped names are removed either way and catalogue order is kept.
 */
export function selectSubcategories(
  targets: string[],
  skip: string[],
  catalogue: readonly Subcategory[] = DEVELOPMENT_SUBCATEGORIES
): { selected: Subcategory[]; unknown: string[] } {
  const known = new Set(catalogue.map((entry) => entry.name.toLowerCase()));
  const unknown = [...targets, ...skip].filter((name) => !known.has(name.toLowerCase()));

  const skipped = new Set(skip.map((name) => name.toLowerCase()));
  const wanted = new Set(targets.map((name) => name.toLowerCase()));

  const selected = catalogue.filter((entry) => {
    const name = entry.name.toLowerCase();
    return (wanted.size === 0 || wanted.has(name)) && !skipped.has(name);
  });

  return { selected, unknown };
}
