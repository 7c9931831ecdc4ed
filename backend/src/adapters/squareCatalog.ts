import type {
  MenuCategory,
  MenuItem,
  MenuItemModifierList,
  MenuItemVariation,
} from '../types/menuContracts';
import { OrderStatus } from '../types/orderStatus';
import type { OrderStatusValue } from '../types/orderStatus';
import type { SquareCatalogObject, SquareItemData, SquareOrder } from '../types/squareContracts';
import {
  centsToDollars,
  extractCustomizationTypes,
  groupIntoCategories,
  toSelectionType,
} from './menuNormalization';
import type { CategorizedItem } from './menuNormalization';

type ModifierListTemplate = Omit<MenuItemModifierList, 'minSelections' | 'maxSelections'>;

const isLive = (object: SquareCatalogObject) => object.is_deleted !== true;

const indexImages = (objects: SquareCatalogObject[]) => {
  const urls = new Map<string, string>();
  for (const object of objects) {
    if (object.type === 'IMAGE' && object.image_data?.url) {
      urls.set(object.id, object.image_data.url);
    }
  }
  return urls;
};

const indexModifierLists = (objects: SquareCatalogObject[]) => {
  const lists = new Map<string, ModifierListTemplate>();
  for (const object of objects) {
    const data = object.modifier_list_data;
    if (object.type !== 'MODIFIER_LIST' || !data) {
      continue;
    }

    const modifiers = (data.modifiers ?? []).flatMap((modifier) => {
      const modifierData = modifier.modifier_data;
      if (!modifierData || modifier.is_deleted === true) {
        return [];
      }
      return [
        {
          id: modifier.id,
          name: modifierData.name,
          price: centsToDollars(modifierData.price_money?.amount),
          isDefault: modifierData.on_by_default ?? false,
        },
      ];
    });

    lists.set(object.id, {
      id: object.id,
      name: data.name,
      selectionType: toSelectionType(data.selection_type),
      modifiers,
    });
  }
  return lists;
};

const buildVariations = (itemData: SquareItemData): MenuItemVariation[] =>
  (itemData.variations ?? [])
    .map((variation) => ({
      id: variation.id,
      name: variation.item_variation_data?.name ?? '',
      price: centsToDollars(variation.item_variation_data?.price_money?.amount),
      ordinal: variation.item_variation_data?.ordinal ?? 0,
    }))
    .sort((a, b) => a.ordinal - b.ordinal);

const buildModifierLists = (
  itemData: SquareItemData,
  lists: Map<string, ModifierListTemplate>,
): MenuItemModifierList[] =>
  (itemData.modifier_list_info ?? []).flatMap((info) => {
    if (info.enabled === false || info.hidden_from_customer === true) {
      return [];
    }

    const template = lists.get(info.modifier_list_id);
    if (!template) {
      return [];
    }

    return [
      {
        ...template,
        minSelections: Math.max(0, info.min_selected_modifiers ?? 0),
        maxSelections: info.max_selected_modifiers ?? 1,
      },
    ];
  });

const resolveImage = (itemData: SquareItemData, images: Map<string, string>) => {
  for (const imageId of itemData.image_ids ?? []) {
    const url = images.get(imageId);
    if (url) {
      return url;
    }
  }
  return undefined;
};

export const buildSquareMenu = (objects: SquareCatalogObject[]): MenuCategory[] => {
  const live = objects.filter(isLive);
  const images = indexImages(live);
  const modifierLists = indexModifierLists(live);

  const categories = live.flatMap((object) =>
    object.type === 'CATEGORY' && object.category_data
      ? [{ id: object.id, name: object.category_data.name }]
      : [],
  );

  const items: CategorizedItem[] = live.flatMap((object) => {
    const itemData = object.item_data;
    if (object.type !== 'ITEM' || !itemData || itemData.is_archived === true) {
      return [];
    }

    const variations = buildVariations(itemData);
    const lists = buildModifierLists(itemData, modifierLists);
    const item: MenuItem = {
      id: object.id,
      name: itemData.name,
      price: variations[0]?.price ?? 0,
      variations: variations.length > 0 ? variations : undefined,
      customizations: extractCustomizationTypes(lists),
      imageURL: resolveImage(itemData, images),
      modifierLists: lists,
    };

    return [{ categoryIds: (itemData.categories ?? []).map((category) => category.id), item }];
  });

  return groupIntoCategories(categories, items);
};

const mapPickupState = (state: string): OrderStatusValue => {
  switch (state.toUpperCase()) {
    case 'PROPOSED':
      return OrderStatus.SUBMITTED;
    case 'RESERVED':
      return OrderStatus.IN_PROGRESS;
    case 'PREPARED':
      return OrderStatus.READY;
    case 'FULFILLED':
      return OrderStatus.COMPLETED;
    case 'CANCELED':
      return OrderStatus.CANCELLED;
    default:
      return OrderStatus.IN_PROGRESS;
  }
};

export const mapSquareOrderStatus = (
  order: Pick<SquareOrder, 'state' | 'fulfillments'>,
): OrderStatusValue => {
  switch (order.state.toUpperCase()) {
    case 'OPEN': {
      const pickup = order.fulfillments?.find((fulfillment) => fulfillment.type === 'PICKUP');
      return pickup ? mapPickupState(pickup.state) : OrderStatus.IN_PROGRESS;
    }
    case 'COMPLETED':
      return OrderStatus.COMPLETED;
    case 'CANCELED':
      return OrderStatus.CANCELLED;
    case 'DRAFT':
      return OrderStatus.DRAFT;
    case 'PENDING':
      return OrderStatus.PENDING;
    default:
      return OrderStatus.SUBMITTED;
  }
};
